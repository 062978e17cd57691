// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import { MultilinearPolynomial } from './MultilinearPolynomial';
import { ShapeMismatchError } from '../MemoryCheckError';
import { toBits } from '../utils';

// EQUALITY AND ONE-HOT
// ================================================================================================
/** eq(x, y) = Π (xᵢ·yᵢ + (1 - xᵢ)·(1 - yᵢ)); equals 1 when x = y on the hypercube and 0 otherwise */
export function eq(field: FiniteField, x: readonly bigint[], y: readonly bigint[]): bigint {
    checkSameLength(x, y);
    let result = field.one;
    for (let i = 0; i < x.length; i++) {
        result = field.mul(result, eqBit(field, x[i], y[i]));
    }
    return result;
}

/** Evaluates the one-hot polynomial of `index` at `point` in O(n) */
export function oneHot(field: FiniteField, index: number, point: readonly bigint[]): bigint {
    checkIndex(index, point.length);
    let result = field.one;
    for (let i = 0; i < point.length; i++) {
        let bit = (index >>> i) & 1;
        result = field.mul(result, bit ? point[i] : field.sub(field.one, point[i]));
    }
    return result;
}

export function oneHotPolynomial(field: FiniteField, numVariables: number, index: number): MultilinearPolynomial {
    checkIndex(index, numVariables);
    return MultilinearPolynomial.fromSparse(field, numVariables, [[index, field.one]]);
}

/** Values of eq(point, b) for every b in {0,1}^n, in index order */
export function eqTable(field: FiniteField, point: readonly bigint[]): bigint[] {
    let table = [field.one];
    // the table is built from the last variable down so that variable i ends up at bit i
    for (let i = point.length - 1; i >= 0; i--) {
        const r = point[i];
        const oneMinusR = field.sub(field.one, r);
        const next = new Array<bigint>(table.length * 2);
        for (let j = 0; j < table.length; j++) {
            next[2 * j] = field.mul(table[j], oneMinusR);
            next[2 * j + 1] = field.mul(table[j], r);
        }
        table = next;
    }
    return table;
}

// LESS-THAN
// ================================================================================================
/**
 * Multilinear extension of [int(x) < int(y)] for n-bit little-endian indexes:
 * LT(x, y) = Σᵢ (1 - xᵢ)·yᵢ·Π_{j > i} eq(xⱼ, yⱼ)
 */
export function lessThan(field: FiniteField, x: readonly bigint[], y: readonly bigint[]): bigint {
    checkSameLength(x, y);
    let result = field.zero;
    let prefix = field.one;     // agreement on all bits above i
    for (let i = x.length - 1; i >= 0; i--) {
        let term = field.mul(field.sub(field.one, x[i]), y[i]);
        result = field.add(result, field.mul(prefix, term));
        prefix = field.mul(prefix, eqBit(field, x[i], y[i]));
    }
    return result;
}

/** Values of LT(b, y) for every b in {0,1}^n, in index order */
export function lessThanTable(field: FiniteField, y: readonly bigint[]): bigint[] {
    const n = y.length;
    const result = new Array<bigint>(2 ** n);
    for (let index = 0; index < result.length; index++) {
        result[index] = lessThan(field, toFieldBits(field, index, n), y);
    }
    return result;
}

/** Boolean comparison of two indexes through their bit decompositions */
export function lessThanBits(a: number, b: number, bitCount: number): boolean {
    const aBits = toBits(a, bitCount), bBits = toBits(b, bitCount);
    for (let i = bitCount - 1; i >= 0; i--) {
        if (aBits[i] !== bBits[i]) return aBits[i] < bBits[i];
    }
    return false;
}

export function toFieldBits(field: FiniteField, index: number, bitCount: number): bigint[] {
    return toBits(index, bitCount).map(bit => bit ? field.one : field.zero);
}

// HELPER FUNCTIONS
// ================================================================================================
function eqBit(field: FiniteField, x: bigint, y: bigint): bigint {
    // x·y + (1 - x)·(1 - y) = 1 - x - y + 2xy
    const xy = field.mul(x, y);
    return field.add(field.sub(field.sub(field.one, x), y), field.add(xy, xy));
}

function checkSameLength(x: readonly bigint[], y: readonly bigint[]) {
    if (x.length !== y.length) {
        throw new ShapeMismatchError(`Points must have the same number of coordinates, but had ${x.length} and ${y.length}`);
    }
}

function checkIndex(index: number, numVariables: number) {
    if (!Number.isInteger(index) || index < 0 || index >= 2 ** numVariables) {
        throw new ShapeMismatchError(`Index ${index} cannot be encoded with ${numVariables} bits`);
    }
}
