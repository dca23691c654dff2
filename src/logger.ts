export type LogFields = Record<string, unknown>;

export interface RestoreLogger {
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
}

export const consoleLogger: RestoreLogger = {
    info(message, fields = {}) {
        console.log(message, fields);
    },
    warn(message, fields = {}) {
        console.warn(message, fields);
    },
    error(message, fields = {}) {
        console.error(message, fields);
    },
};

export const silentLogger: RestoreLogger = {
    info() {},
    warn() {},
    error() {},
};
