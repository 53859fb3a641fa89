const DEFAULT_PREFIX = '[deck-engine]';

/**
 * Console logger that stays silent unless logging is enabled.
 */
export class Logger {
  constructor(
    private readonly enabled: boolean,
    private readonly prefix: string = DEFAULT_PREFIX,
  ) {}

  get isEnabled(): boolean {
    return this.enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled) return;
    console.debug(`${this.prefix} ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled) return;
    console.warn(`${this.prefix} ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled) return;
    console.error(`${this.prefix} ${message}`, ...args);
  }
}
