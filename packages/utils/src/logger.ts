/**
 * Logger Utility
 *
 * 带模块前缀的日志工具。全局级别默认 WARN，
 * 单个实例可以用 setLevel 覆盖。
 */

export enum LogLevel {
    NONE = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
}

let globalLogLevel: LogLevel = LogLevel.WARN;

export function setGlobalLogLevel(level: LogLevel): void {
    globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
    return globalLogLevel;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    none: LogLevel.NONE,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
};

/**
 * 将 'debug' / 'WARN' 等名字解析为 LogLevel
 *
 * @throws 名字不在 none/error/warn/info/debug 之中
 */
export function parseLogLevel(name: string): LogLevel {
    const level = LEVEL_NAMES[name.trim().toLowerCase()];
    if (level === undefined) {
        throw new Error(`Unknown log level: ${name}`);
    }
    return level;
}

/**
 * @example
 * ```typescript
 * const logger = new Logger('IO-Bridge');
 * logger.debug('opaque encoding for torch.bfloat16');
 * // 输出: [IO-Bridge] opaque encoding for torch.bfloat16
 * ```
 */
export class Logger {
    private readonly module: string;
    private localLevel?: LogLevel;

    constructor(module: string) {
        this.module = module;
    }

    setLevel(level: LogLevel): void {
        this.localLevel = level;
    }

    /**
     * 派生子模块 logger，前缀形如 [IO-Bridge:encode]，继承局部级别
     */
    child(name: string): Logger {
        const child = new Logger(`${this.module}:${name}`);
        if (this.localLevel !== undefined) {
            child.setLevel(this.localLevel);
        }
        return child;
    }

    isEnabled(level: LogLevel): boolean {
        return (this.localLevel ?? globalLogLevel) >= level;
    }

    debug(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.DEBUG)) {
            console.log(`[${this.module}]`, ...args);
        }
    }

    info(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.INFO)) {
            console.info(`[${this.module}]`, ...args);
        }
    }

    warn(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.WARN)) {
            console.warn(`[${this.module}]`, ...args);
        }
    }

    error(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.ERROR)) {
            console.error(`[${this.module}]`, ...args);
        }
    }
}
