// IMPORTS
// ================================================================================================
import type { Logger as ILogger, LogFunction } from '../../twistshout';

// INTERFACES
// ================================================================================================
export type LogSink = (line: string) => void;

interface LogEntry {
    readonly prefix : string;
    readonly start  : number;
    last            : number;
}

// CLASS DEFINITION
// ================================================================================================
export class Logger implements ILogger {

    private readonly entries    : Map<LogFunction, LogEntry>;
    private readonly sink       : LogSink;
    private readonly enableSubLog : boolean;
    private readonly now        : () => number;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(enableSubLog = true, sink: LogSink = console.log, now: () => number = Date.now) {
        this.entries = new Map();
        this.sink = sink;
        this.enableSubLog = enableSubLog;
        this.now = now;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    start(message?: string, prefix?: string): LogFunction {
        if (message) {
            this.sink(`${prefix || ''}${message}`);
        }
        const ts = this.now();
        const entry: LogEntry = { prefix: prefix || '', start: ts, last: ts };
        const log: LogFunction = (step: string) => this.log(entry, step);
        this.entries.set(log, entry);
        return log;
    }

    sub(message?: string): LogFunction {
        if (this.enableSubLog) {
            return this.start(message, '  ');
        }
        else {
            return noopLog;
        }
    }

    done(log: LogFunction, message?: string): void {
        const entry = this.entries.get(log);
        if (!entry) return;
        if (message) {
            this.sink(`${entry.prefix}${message} in ${this.now() - entry.start} ms`);
        }
        this.entries.delete(log);
    }

    // PRIVATE METHODS
    // --------------------------------------------------------------------------------------------
    private log(entry: LogEntry, message: string) {
        const ts = this.now();
        this.sink(`${entry.prefix}${message} in ${ts - entry.last} ms`);
        entry.last = ts;
    }
}

// NOOP LOGGER
// ================================================================================================
const noopLog: LogFunction = () => undefined;
export const noopLogger: ILogger = {
    start   : () => noopLog,
    sub     : () => noopLog,
    done    : () => undefined
};
