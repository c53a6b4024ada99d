const isDev = () => typeof process != 'undefined' && process.env.NODE_ENV === 'development'

export class Logger {
  constructor(readonly scope?: string) { }

  /// Only printed when `NODE_ENV` is `development`.
  debug(...args: unknown[]): void {
    if (isDev()) {
      console.debug(this._prefix('DEBUG'), ...args)
    }
  }

  info(...args: unknown[]): void {
    console.info(this._prefix('INFO'), ...args)
  }

  warn(...args: unknown[]): void {
    console.warn(this._prefix('WARN'), ...args)
  }

  error(...args: unknown[]): void {
    console.error(this._prefix('ERROR'), ...args)
  }

  /// Derive a logger whose lines are tagged with `scope`.
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope)
  }

  /// @internal
  _prefix(level: string): string {
    return this.scope ? `[${level}] [${this.scope}]` : `[${level}]`
  }
}

export const logger = new Logger()
