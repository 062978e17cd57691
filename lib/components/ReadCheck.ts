// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import { Transcript } from './Transcript';
import { MultilinearPolynomial } from './MultilinearPolynomial';
import { VirtualPolynomial } from './SumCheck';
import { eq, eqTable } from './StructuredPolynomials';
import { innerProduct, powers } from '../utils';

// INTERFACES
// ================================================================================================
/**
 * Randomness for the combined read-check. Polynomials over (address, cycle) pairs put the
 * address bits first, so index a + K·j holds the entry for address a at cycle j.
 */
export interface ReadCheckChallenges {
    readonly logMemorySize  : number;
    readonly logCycles      : number;

    /** cycle point at which the read values are compared */
    readonly rCycle         : bigint[];

    /** point for the booleanity check of the one-hot address matrix */
    readonly rBoolean       : bigint[];

    /** cycle point for the hamming weight check of the one-hot address matrix */
    readonly rWeight        : bigint[];

    /** batching coefficient */
    readonly gamma          : bigint;
}

// MODULE VARIABLES
// ================================================================================================
export const READ_CHECK_DEGREE = 3;

// PUBLIC FUNCTIONS
// ================================================================================================
export function drawReadCheckChallenges(transcript: Transcript, logMemorySize: number, logCycles: number): ReadCheckChallenges {
    return {
        logMemorySize, logCycles,
        rCycle      : transcript.challenges('r_cycle', logCycles),
        rBoolean    : transcript.challenges('r_boolean', logMemorySize + logCycles),
        rWeight     : transcript.challenges('r_weight', logCycles),
        gamma       : transcript.challenge('gamma')
    };
}

/**
 * Builds the summand of
 *   rv(r_cycle) + γ² = Σ eq(r_cycle, j)·A(a, j)·Val(a, j)
 *                    + γ·eq(r_boolean, (a, j))·(A(a, j)² - A(a, j))
 *                    + γ²·eq(r_weight, j)·A(a, j)
 * The first term holds when every read returns the addressed memory value; the other two hold
 * when every column of A has exactly one entry equal to 1 and all others equal to 0.
 */
export function buildReadCheckPolynomial(field: FiniteField, address: MultilinearPolynomial, memory: readonly bigint[], challenges: ReadCheckChallenges): VirtualPolynomial {
    const memorySize = 2 ** challenges.logMemorySize;
    const weights = powers(field, challenges.gamma, 3);

    const tables = [
        spreadOverAddresses(eqTable(field, challenges.rCycle), memorySize),
        address.toEvaluations(),
        memory,
        eqTable(field, challenges.rBoolean),
        spreadOverAddresses(eqTable(field, challenges.rWeight), memorySize)
    ];

    return {
        numVariables: challenges.logMemorySize + challenges.logCycles,
        degree: READ_CHECK_DEGREE,
        tables,
        combine: ([eCycle, a, val, eBoolean, eWeight]: readonly bigint[]) => {
            let read = field.mul(field.mul(eCycle, a), val);
            let booleanity = field.mul(eBoolean, field.sub(field.mul(a, a), a));
            let weight = field.mul(eWeight, a);
            return innerProduct(field, [read, booleanity, weight], weights);
        }
    };
}

export function getReadCheckClaim(field: FiniteField, readValue: bigint, challenges: ReadCheckChallenges): bigint {
    return field.add(readValue, field.mul(challenges.gamma, challenges.gamma));
}

/** Evaluates the read-check summand at ρ from claimed evaluations of A and Val at ρ */
export function evaluateReadCheckSummand(field: FiniteField, point: readonly bigint[], addressValue: bigint, memoryValue: bigint, challenges: ReadCheckChallenges): bigint {
    const cyclePoint = point.slice(challenges.logMemorySize);

    const read = field.mul(field.mul(eq(field, challenges.rCycle, cyclePoint), addressValue), memoryValue);
    const squared = field.sub(field.mul(addressValue, addressValue), addressValue);
    const booleanity = field.mul(eq(field, challenges.rBoolean, point), squared);
    const weight = field.mul(eq(field, challenges.rWeight, cyclePoint), addressValue);

    return innerProduct(field, [read, booleanity, weight], powers(field, challenges.gamma, 3));
}

/** Turns a table over cycles into a table over (address, cycle) pairs that ignores the address */
export function spreadOverAddresses(cycleTable: readonly bigint[], memorySize: number): bigint[] {
    const result = new Array<bigint>(cycleTable.length * memorySize);
    for (let j = 0; j < cycleTable.length; j++) {
        result.fill(cycleTable[j], j * memorySize, (j + 1) * memorySize);
    }
    return result;
}

/** Turns a table over addresses into a table over (address, cycle) pairs that ignores the cycle */
export function repeatOverCycles(addressTable: readonly bigint[], cycleCount: number): bigint[] {
    const result = new Array<bigint>(addressTable.length * cycleCount);
    for (let j = 0; j < cycleCount; j++) {
        for (let a = 0; a < addressTable.length; a++) {
            result[j * addressTable.length + a] = addressTable[a];
        }
    }
    return result;
}
