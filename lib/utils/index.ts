// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';

// RE-EXPORTS
// ================================================================================================
export { sizeOfTwistProof, sizeOfShoutProof } from './sizeof';
export { Logger, noopLogger } from './Logger';

// CONSTANTS
// ================================================================================================
const MASK_64B = 0xFFFFFFFFFFFFFFFFn;

// MATH
// ================================================================================================
export function isPowerOf2(value: number | bigint): boolean {
    if (typeof value === 'bigint') {
        return (value !== 0n) && (value & (value - 1n)) === 0n;
    }
    else {
        return (value !== 0) && (value & (value - 1)) === 0;
    }
}

/** Number of variables needed to index `size` values; 0 for sizes up to 1 */
export function log2Ceil(size: number): number {
    let bits = 0;
    while ((1 << bits) < size) bits++;
    return bits;
}

export function toBits(index: number, bitCount: number): number[] {
    const result = new Array<number>(bitCount);
    for (let i = 0; i < bitCount; i++) {
        result[i] = (index >>> i) & 1;
    }
    return result;
}

// FIELD HELPERS
// ================================================================================================
export function isFieldElement(field: FiniteField, value: unknown): value is bigint {
    return (typeof value === 'bigint') && value >= 0n && value < field.characteristic;
}

export function innerProduct(field: FiniteField, a: readonly bigint[], b: readonly bigint[]): bigint {
    if (a.length !== b.length) throw new Error(`Cannot multiply vectors of lengths ${a.length} and ${b.length}`);
    let result = field.zero;
    for (let i = 0; i < a.length; i++) {
        result = field.add(result, field.mul(a[i], b[i]));
    }
    return result;
}

/** Evaluates a polynomial given by its coefficients (lowest degree first) at x */
export function hornerEval(field: FiniteField, coefficients: readonly bigint[], x: bigint): bigint {
    let result = field.zero;
    for (let i = coefficients.length - 1; i >= 0; i--) {
        result = field.add(field.mul(result, x), coefficients[i]);
    }
    return result;
}

/** Returns [1, x, x^2, ..., x^(count - 1)] */
export function powers(field: FiniteField, x: bigint, count: number): bigint[] {
    const result = new Array<bigint>(count);
    let current = field.one;
    for (let i = 0; i < count; i++) {
        result[i] = current;
        current = field.mul(current, x);
    }
    return result;
}

// BIGINT-BUFFER CONVERSIONS
// ================================================================================================
export function writeBigInt(value: bigint, buffer: Buffer, offset: number, elementSize: number): number {
    if (value < 0n || value >= (1n << BigInt(elementSize * 8))) {
        throw new RangeError(`Value ${value} does not fit into ${elementSize} bytes`);
    }
    const limbCount = elementSize >> 3;
    for (let i = 0; i < limbCount; i++) {
        buffer.writeBigUInt64LE(value & MASK_64B, offset);
        value = value >> 64n;
        offset += 8;
    }
    return offset;
}

export function scalarsToBuffer(values: readonly bigint[], elementSize: number): Buffer {
    const buffer = Buffer.alloc(values.length * elementSize);
    let offset = 0;
    for (let value of values) {
        offset = writeBigInt(value, buffer, offset, elementSize);
    }
    return buffer;
}
