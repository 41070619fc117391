import debug from 'debug';

const BASE_NAMESPACE = 'nestwise';

/**
 * Diagnostic sink handed to sessions. Arguments follow the printf-style formatting of the
 * `debug` package (%s, %d, %O).
 */
export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
}

export class DebugLogger implements Logger {
    private readonly warnings: debug.Debugger;

    constructor(private readonly sink: debug.Debugger) {
        this.warnings = sink.extend('warn');
    }

    debug(message: string, ...args: unknown[]): void {
        this.sink(message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.warnings(message, ...args);
    }
}

/**
 * createLogger('transaction') logs to nestwise:transaction, warnings to nestwise:transaction:warn.
 * Enable output with DEBUG=nestwise:*
 */
export function createLogger(subNamespace: string): Logger {
    return new DebugLogger(debug(`${BASE_NAMESPACE}:${subNamespace}`));
}

export class NoopLogger implements Logger {
    debug(): void {
    }

    warn(): void {
    }
}

export type LogEntry = {
    level: 'debug' | 'warn',
    message: string,
    args: unknown[],
};

export class CollectingLogger implements Logger {
    public readonly entries: LogEntry[] = [];

    debug(message: string, ...args: unknown[]): void {
        this.entries.push({level: 'debug', message, args});
    }

    warn(message: string, ...args: unknown[]): void {
        this.entries.push({level: 'warn', message, args});
    }

    warnings(): LogEntry[] {
        return this.entries.filter(entry => entry.level === 'warn');
    }
}
