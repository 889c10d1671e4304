export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const PREFIXES: Record<Exclude<LogLevel, 'silent'>, string> = {
  error: '[ERROR]',
  warn: '[WARN] ',
  info: '[INFO] ',
  debug: '[DEBUG]',
};

export class Logger {
  private level: LogLevel;
  private patterns: RegExp[];
  private readonly scope: string | undefined;

  constructor(level: LogLevel = 'warn', redactPatterns: string[] = [], scope?: string) {
    this.level = level;
    this.patterns = redactPatterns.map((p) => new RegExp(p, 'gi'));
    this.scope = scope;
  }

  private redact(message: string): string {
    let result = message;
    for (const pattern of this.patterns) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] <= LOG_LEVELS[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    const scope = this.scope ? `[${this.scope}] ` : '';
    const extra = args.map((a) =>
      this.redact(typeof a === 'string' ? a : JSON.stringify(a) ?? String(a))
    );
    process.stderr.write(
      `${PREFIXES[level]} ${scope}${this.redact(message)}${extra.length ? ' ' + extra.join(' ') : ''}\n`
    );
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  configure(options: { level?: LogLevel; redactPatterns?: string[] }): void {
    if (options.level) this.level = options.level;
    if (options.redactPatterns) {
      this.patterns = options.redactPatterns.map((p) => new RegExp(p, 'gi'));
    }
  }
}

// Singleton logger, configured at startup from the loaded config and --verbose
export const logger = new Logger();
