// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type { MultilinearOracle } from '../../twistshout';
import { ShapeMismatchError } from '../MemoryCheckError';
import { isPowerOf2 } from '../utils';

// INTERFACES
// ================================================================================================
export type Evaluations =
    | { readonly kind: 'dense', readonly values: readonly bigint[] }
    | { readonly kind: 'sparse', readonly entries: ReadonlyMap<number, bigint> };

// CLASS DEFINITION
// ================================================================================================
/**
 * Multilinear extension of a function {0,1}^n -> F. Variable i of the polynomial corresponds to
 * bit i of the index into the evaluation table, so the first variable selects between even and
 * odd entries.
 */
export class MultilinearPolynomial implements MultilinearOracle {

    readonly field          : FiniteField;
    readonly numVariables   : number;
    readonly evaluations    : Evaluations;

    // CONSTRUCTORS
    // --------------------------------------------------------------------------------------------
    private constructor(field: FiniteField, numVariables: number, evaluations: Evaluations) {
        this.field = field;
        this.numVariables = numVariables;
        this.evaluations = evaluations;
    }

    static fromEvaluations(field: FiniteField, values: readonly bigint[]): MultilinearPolynomial {
        if (!isPowerOf2(values.length)) {
            throw new ShapeMismatchError(`Evaluation count must be a power of 2, but was ${values.length}`);
        }
        const numVariables = Math.log2(values.length);
        return new MultilinearPolynomial(field, numVariables, { kind: 'dense', values: values.slice() });
    }

    static fromSparse(field: FiniteField, numVariables: number, entries: Iterable<[number, bigint]>): MultilinearPolynomial {
        const size = 2 ** numVariables;
        const map = new Map<number, bigint>();
        for (let [index, value] of entries) {
            if (!Number.isInteger(index) || index < 0 || index >= size) {
                throw new ShapeMismatchError(`Index ${index} is outside of the ${numVariables}-variable hypercube`);
            }
            if (value === field.zero) {
                map.delete(index);
            }
            else {
                map.set(index, value);
            }
        }
        return new MultilinearPolynomial(field, numVariables, { kind: 'sparse', entries: map });
    }

    static zero(field: FiniteField, numVariables: number): MultilinearPolynomial {
        return MultilinearPolynomial.fromSparse(field, numVariables, []);
    }

    // ACCESSORS
    // --------------------------------------------------------------------------------------------
    get size(): number {
        return 2 ** this.numVariables;
    }

    get isSparse(): boolean {
        return this.evaluations.kind === 'sparse';
    }

    get isZero(): boolean {
        const evaluations = this.evaluations;
        switch (evaluations.kind) {
            case 'dense': return evaluations.values.every(v => v === this.field.zero);
            case 'sparse': return evaluations.entries.size === 0;
        }
    }

    getValue(index: number): bigint {
        const evaluations = this.evaluations;
        switch (evaluations.kind) {
            case 'dense': return evaluations.values[index];
            case 'sparse': return evaluations.entries.get(index) ?? this.field.zero;
        }
    }

    /** Iterates over (index, value) pairs that may be nonzero */
    *nonZeroEntries(): IterableIterator<[number, bigint]> {
        const evaluations = this.evaluations;
        if (evaluations.kind === 'sparse') {
            yield* evaluations.entries;
        }
        else {
            for (let i = 0; i < evaluations.values.length; i++) {
                if (evaluations.values[i] !== this.field.zero) {
                    yield [i, evaluations.values[i]];
                }
            }
        }
    }

    toEvaluations(): bigint[] {
        const evaluations = this.evaluations;
        if (evaluations.kind === 'dense') return evaluations.values.slice();

        const result = new Array<bigint>(this.size).fill(this.field.zero);
        for (let [index, value] of evaluations.entries) {
            result[index] = value;
        }
        return result;
    }

    toDense(): MultilinearPolynomial {
        if (this.evaluations.kind === 'dense') return this;
        return new MultilinearPolynomial(this.field, this.numVariables, { kind: 'dense', values: this.toEvaluations() });
    }

    // EVALUATION
    // --------------------------------------------------------------------------------------------
    evaluate(point: readonly bigint[]): bigint {
        if (point.length !== this.numVariables) {
            throw new ShapeMismatchError(`Point must have ${this.numVariables} coordinates, but had ${point.length}`);
        }

        const evaluations = this.evaluations;
        if (evaluations.kind === 'sparse') {
            // Σ f(b)·eq(point, b) over the nonzero entries only
            let result = this.field.zero;
            for (let [index, value] of evaluations.entries) {
                result = this.field.add(result, this.field.mul(value, this.basisAt(index, point)));
            }
            return result;
        }

        let table = evaluations.values;
        for (let r of point) {
            table = foldFirst(this.field, table, r);
        }
        return table[0];
    }

    /** Fixes the first variable to `r`, producing a polynomial in the remaining variables */
    bind(r: bigint): MultilinearPolynomial {
        if (this.numVariables === 0) {
            throw new ShapeMismatchError(`Cannot bind a variable of a constant polynomial`);
        }

        const evaluations = this.evaluations;
        const numVariables = this.numVariables - 1;
        if (evaluations.kind === 'dense') {
            const values = foldFirst(this.field, evaluations.values, r);
            return new MultilinearPolynomial(this.field, numVariables, { kind: 'dense', values });
        }

        // f'(b) = f(2b) + r·(f(2b + 1) - f(2b))
        const field = this.field;
        const oneMinusR = field.sub(field.one, r);
        const entries = new Map<number, bigint>();
        for (let [index, value] of evaluations.entries) {
            let target = index >>> 1;
            let weight = (index & 1) ? r : oneMinusR;
            let current = entries.get(target) ?? field.zero;
            entries.set(target, field.add(current, field.mul(weight, value)));
        }
        return MultilinearPolynomial.fromSparse(field, numVariables, entries);
    }

    bindMany(values: readonly bigint[]): MultilinearPolynomial {
        if (values.length > this.numVariables) {
            throw new ShapeMismatchError(`Cannot bind ${values.length} variables of a ${this.numVariables}-variable polynomial`);
        }
        let result: MultilinearPolynomial = this;
        for (let r of values) {
            result = result.bind(r);
        }
        return result;
    }

    /** Returns f(1, x₂, ..., xₙ) - f(0, x₂, ..., xₙ) as a polynomial in the remaining variables */
    slope(): MultilinearPolynomial {
        if (this.numVariables === 0) {
            throw new ShapeMismatchError(`A constant polynomial has no variables`);
        }

        const field = this.field;
        const evaluations = this.evaluations;
        if (evaluations.kind === 'dense') {
            const half = evaluations.values.length >>> 1;
            const values = new Array<bigint>(half);
            for (let i = 0; i < half; i++) {
                values[i] = field.sub(evaluations.values[2 * i + 1], evaluations.values[2 * i]);
            }
            return new MultilinearPolynomial(field, this.numVariables - 1, { kind: 'dense', values });
        }

        const entries = new Map<number, bigint>();
        for (let [index, value] of evaluations.entries) {
            let target = index >>> 1;
            let current = entries.get(target) ?? field.zero;
            entries.set(target, (index & 1) ? field.add(current, value) : field.sub(current, value));
        }
        return MultilinearPolynomial.fromSparse(field, this.numVariables - 1, entries);
    }

    // ARITHMETIC
    // --------------------------------------------------------------------------------------------
    add(other: MultilinearPolynomial): MultilinearPolynomial {
        this.checkSameShape(other);
        const field = this.field;
        if (this.isSparse && other.isSparse) {
            const entries = new Map<number, bigint>(this.nonZeroEntries());
            for (let [index, value] of other.nonZeroEntries()) {
                entries.set(index, field.add(entries.get(index) ?? field.zero, value));
            }
            return MultilinearPolynomial.fromSparse(field, this.numVariables, entries);
        }

        const values = this.toEvaluations();
        for (let [index, value] of other.nonZeroEntries()) {
            values[index] = field.add(values[index], value);
        }
        return new MultilinearPolynomial(field, this.numVariables, { kind: 'dense', values });
    }

    scale(factor: bigint): MultilinearPolynomial {
        const field = this.field;
        const evaluations = this.evaluations;
        if (evaluations.kind === 'dense') {
            const values = evaluations.values.map(v => field.mul(v, factor));
            return new MultilinearPolynomial(field, this.numVariables, { kind: 'dense', values });
        }

        const entries: [number, bigint][] = [];
        for (let [index, value] of evaluations.entries) {
            entries.push([index, field.mul(value, factor)]);
        }
        return MultilinearPolynomial.fromSparse(field, this.numVariables, entries);
    }

    /** Sum of the polynomial over the boolean hypercube */
    sum(): bigint {
        let result = this.field.zero;
        for (let [, value] of this.nonZeroEntries()) {
            result = this.field.add(result, value);
        }
        return result;
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private basisAt(index: number, point: readonly bigint[]): bigint {
        const field = this.field;
        let result = field.one;
        for (let j = 0; j < point.length; j++) {
            let bit = (index >>> j) & 1;
            result = field.mul(result, bit ? point[j] : field.sub(field.one, point[j]));
        }
        return result;
    }

    private checkSameShape(other: MultilinearPolynomial) {
        if (other.numVariables !== this.numVariables) {
            throw new ShapeMismatchError(`Cannot combine ${this.numVariables}-variable and ${other.numVariables}-variable polynomials`);
        }
    }
}

// HELPER FUNCTIONS
// ================================================================================================
/** Binds the first variable of a dense evaluation table */
export function foldFirst(field: FiniteField, table: readonly bigint[], r: bigint): bigint[] {
    const half = table.length >>> 1;
    const result = new Array<bigint>(half);
    for (let i = 0; i < half; i++) {
        let low = table[2 * i], high = table[2 * i + 1];
        result[i] = field.add(low, field.mul(r, field.sub(high, low)));
    }
    return result;
}
