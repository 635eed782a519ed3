export class ContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// classify needs the overall sentiment written by analyse
export class MissingSentimentError extends ContentError {
  readonly key: string;

  constructor(key: string) {
    super(`Missing sentiment key '${key}'. Run analyse() before classify().`);
    this.key = key;
  }
}

export class InvalidDateError extends ContentError {
  constructor() {
    super('Content date is not a valid Date');
  }
}
