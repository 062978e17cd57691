// IMPORTS
// ================================================================================================
import type { MemoryOperation } from '../../twistshout';
import { TraceOutOfBoundsError } from '../MemoryCheckError';

// CLASS DEFINITION
// ================================================================================================
/**
 * Ordered sequence of reads and writes over a memory of 2^logMemorySize cells. Reads of cells
 * that were never written return `defaultValue`. Timestamps with no operation are idle cycles.
 */
export class MemoryTrace {

    readonly logMemorySize  : number;
    readonly defaultValue   : bigint;

    private readonly ops    : MemoryOperation[];
    private readonly memory : Map<number, bigint>;
    private nextTimestamp   : number;

    // CONSTRUCTORS
    // --------------------------------------------------------------------------------------------
    constructor(logMemorySize: number, defaultValue = 0n) {
        if (!Number.isInteger(logMemorySize) || logMemorySize < 1) {
            throw new TypeError(`Memory size must be 2^k for a positive integer k`);
        }
        this.logMemorySize = logMemorySize;
        this.defaultValue = defaultValue;
        this.ops = [];
        this.memory = new Map();
        this.nextTimestamp = 0;
    }

    /**
     * Builds a trace from operations as reported by an external machine; read values are taken
     * as given and are not checked against earlier writes.
     */
    static fromOperations(logMemorySize: number, operations: readonly MemoryOperation[], defaultValue = 0n): MemoryTrace {
        const trace = new MemoryTrace(logMemorySize, defaultValue);
        for (let op of operations) {
            trace.ops.push({ ...op });
            if (op.type === 'write') {
                trace.memory.set(op.address, op.value);
            }
            trace.nextTimestamp = Math.max(trace.nextTimestamp, op.timestamp + 1);
        }
        return trace;
    }

    // ACCESSORS
    // --------------------------------------------------------------------------------------------
    get memorySize(): number {
        return 2 ** this.logMemorySize;
    }

    get operations(): readonly MemoryOperation[] {
        return this.ops;
    }

    /** Number of cycles the trace spans, idle cycles included */
    get length(): number {
        return this.nextTimestamp;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    write(address: number, value: bigint): void {
        this.checkAddress(address);
        this.ops.push({ type: 'write', address, value, timestamp: this.nextTimestamp++ });
        this.memory.set(address, value);
    }

    read(address: number): bigint {
        this.checkAddress(address);
        const value = this.memory.get(address) ?? this.defaultValue;
        this.ops.push({ type: 'read', address, value, timestamp: this.nextTimestamp++ });
        return value;
    }

    /** Advances the clock without touching memory */
    idle(cycles = 1): void {
        if (!Number.isInteger(cycles) || cycles < 0) {
            throw new TypeError(`Idle cycle count must be a non-negative integer`);
        }
        this.nextTimestamp += cycles;
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private checkAddress(address: number) {
        if (!Number.isInteger(address) || address < 0 || address >= this.memorySize) {
            throw new TraceOutOfBoundsError(`Address ${address} is outside of memory of size ${this.memorySize}`);
        }
    }
}
