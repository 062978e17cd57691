// IMPORTS
// ================================================================================================
import type { LookupOperation } from '../../twistshout';
import { IndexOutOfBoundsError } from '../MemoryCheckError';
import { log2Ceil } from '../utils';

// CLASS DEFINITION
// ================================================================================================
export class LookupTable {

    readonly entries        : readonly bigint[];
    private readonly ops    : LookupOperation[];

    // CONSTRUCTORS
    // --------------------------------------------------------------------------------------------
    constructor(entries: readonly bigint[]) {
        if (entries.length === 0) throw new TypeError('Lookup table must have at least one entry');

        // pad the table with zeros to the next power of 2
        const size = 2 ** Math.max(log2Ceil(entries.length), 1);
        const padded = entries.slice();
        while (padded.length < size) {
            padded.push(0n);
        }
        this.entries = Object.freeze(padded);
        this.ops = [];
    }

    /** Builds a table with lookups as reported by an external machine; values are not checked */
    static withLookups(entries: readonly bigint[], lookups: readonly LookupOperation[]): LookupTable {
        const table = new LookupTable(entries);
        for (let lookup of lookups) {
            table.ops.push({ ...lookup });
        }
        return table;
    }

    // ACCESSORS
    // --------------------------------------------------------------------------------------------
    get size(): number {
        return this.entries.length;
    }

    get logSize(): number {
        return Math.log2(this.entries.length);
    }

    get lookups(): readonly LookupOperation[] {
        return this.ops;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    lookup(index: number): bigint {
        if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
            throw new IndexOutOfBoundsError(`Lookup index ${index} is outside of table of size ${this.entries.length}`);
        }
        const value = this.entries[index];
        this.ops.push({ index, value });
        return value;
    }
}
