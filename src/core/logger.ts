/**
 * Rootstake Logger
 *
 * Every component that makes a resolution decision owns one instance under
 * its own namespace:
 *   rootstake:context   root commits (RootContext)
 *   rootstake:exec      project directory detection
 *   rootstake:resolver  marker searches and the root they settle on
 *   rootstake:dotenv    files read into the environment
 *
 * Those decisions are logged at debug. Failures are thrown as RootError and
 * never logged here, so a host that catches them decides what gets printed.
 * Output stays silent below warn; set ROOTSTAKE_LOG_LEVEL (or the shared
 * LOG_LEVEL) to debug to trace why a given root was chosen.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const DEFAULT_LEVEL: LogLevel = 'warn';

function isLogLevel(value: string): value is LogLevel {
    return value in LEVELS;
}

class Logger {
    namespace: string;

    constructor(namespace: string = 'rootstake') {
        this.namespace = namespace;
    }

    get logLevel(): LogLevel {
        const requested = (process.env.ROOTSTAKE_LOG_LEVEL || process.env.LOG_LEVEL || '').trim().toLowerCase();
        return isLogLevel(requested) ? requested : DEFAULT_LEVEL;
    }

    _log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (!this._shouldLog(level)) return;
        const timestamp = new Date().toISOString();
        const prefix = `[${timestamp}] [${this.namespace}] [${level.toUpperCase()}]`;
        if (level === 'error') console.error(prefix, message, ...args);
        else if (level === 'warn') console.warn(prefix, message, ...args);
        else console.log(prefix, message, ...args);
    }

    _shouldLog(level: LogLevel): boolean {
        return LEVELS[level] >= LEVELS[this.logLevel];
    }

    debug(message: string, ...args: unknown[]): void {
        this._log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this._log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this._log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this._log('error', message, ...args);
    }

    child(namespace: string): Logger {
        return new Logger(`${this.namespace}:${namespace}`);
    }
}

export default Logger;
