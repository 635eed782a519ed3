import chalk from 'chalk';
import * as cliProgress from 'cli-progress';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

class Logger {
  private static defaultLevel: LogLevel = 'info';

  private readonly level: LogLevel | undefined;
  private name: string;
  private activeProgress: cliProgress.SingleBar | null = null;

  private levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(name: string, level?: LogLevel) {
    this.name = name;
    this.level = level;
  }

  // Applies to every logger that was not given an explicit level
  static setDefaultLevel(level: LogLevel): void {
    Logger.defaultLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.level ?? Logger.defaultLevel];
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const levelStr = level.toUpperCase().padEnd(5);
    const nameStr = chalk.dim(`[${this.name}]`);
    const formattedArgs = args.length > 0 ? ` ${args.map(formatArg).join(' ')}` : '';

    const levelColor = {
      debug: chalk.gray,
      info: chalk.blue,
      warn: chalk.yellow,
      error: chalk.red,
    }[level];

    return `${chalk.dim(timestamp)} ${levelColor(levelStr)} ${nameStr} ${message}${formattedArgs}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, ...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, ...args));
    }
  }

  // Progress bar for batch operations, drawn on stderr
  createProgress(total: number, title: string): cliProgress.SingleBar {
    this.activeProgress = new cliProgress.SingleBar({
      format: `${chalk.blue(title)} ${chalk.cyan('{bar}')} {percentage}% | {value}/{total} | ETA: {eta}s`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    });
    this.activeProgress.start(total, 0);
    return this.activeProgress;
  }

  stopProgress(): void {
    if (this.activeProgress) {
      this.activeProgress.stop();
      this.activeProgress = null;
    }
  }

  // Runs items one after another under a progress bar, keeping input order
  async withProgress<T, R>(
    title: string,
    items: readonly T[],
    operation: (item: T, index: number) => Promise<R>
  ): Promise<R[]> {
    const progress = this.createProgress(items.length, title);
    const results: R[] = [];

    try {
      for (let i = 0; i < items.length; i++) {
        results.push(await operation(items[i], i));
        progress.increment();
      }
    } finally {
      this.stopProgress();
    }

    return results;
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
}

export { Logger };
export type { LogLevel };
