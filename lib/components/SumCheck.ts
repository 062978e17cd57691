// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type { SumCheckProof, SumCheckResult } from '../../twistshout';
import { Transcript } from './Transcript';
import { foldFirst } from './MultilinearPolynomial';
import { DegreeViolationError, ShapeMismatchError } from '../MemoryCheckError';
import { hornerEval, isFieldElement } from '../utils';

// INTERFACES
// ================================================================================================
/**
 * A polynomial of the form P(x) = combine(t₁(x), ..., tₖ(x)) where each tᵢ is a multilinear
 * extension given by its evaluation table and `degree` bounds the degree of P in every variable.
 */
export interface VirtualPolynomial {
    readonly numVariables   : number;
    readonly degree         : number;
    readonly tables         : readonly (readonly bigint[])[];
    combine(values: readonly bigint[]): bigint;
}

export interface SumCheckProverResult {
    readonly proof          : SumCheckProof;
    readonly point          : bigint[];

    /** values of every table at the final point, in table order */
    readonly tableValues    : bigint[];
}

// PROVER
// ================================================================================================
export class SumCheckProver {

    readonly field: FiniteField;

    constructor(field: FiniteField) {
        this.field = field;
    }

    prove(polynomial: VirtualPolynomial, transcript: Transcript, label: string): SumCheckProverResult {
        const field = this.field;
        const { numVariables, degree } = polynomial;
        if (!Number.isInteger(degree) || degree < 1) {
            throw new DegreeViolationError(`Degree bound must be a positive integer, but was ${degree}`);
        }
        for (let table of polynomial.tables) {
            if (table.length !== 2 ** numVariables) {
                throw new ShapeMismatchError(`Table has ${table.length} entries, but ${2 ** numVariables} were expected`);
            }
        }

        // one extra evaluation point exposes summands of higher degree than declared
        const xs = this.field.newVectorFrom(range(field, degree + 1));
        const extraX = BigInt(degree + 1);

        let tables = polynomial.tables.map(t => t.slice());
        const rounds: bigint[][] = [];
        const point: bigint[] = [];
        const values = new Array<bigint>(tables.length);
        const diffs = new Array<bigint>(tables.length);

        for (let round = 0; round < numVariables; round++) {
            const sums = new Array<bigint>(degree + 2).fill(field.zero);
            const half = 2 ** (numVariables - round - 1);

            for (let b = 0; b < half; b++) {
                for (let k = 0; k < tables.length; k++) {
                    values[k] = tables[k][2 * b];
                    diffs[k] = field.sub(tables[k][2 * b + 1], values[k]);
                }
                for (let x = 0; x <= degree + 1; x++) {
                    if (x > 0) {
                        for (let k = 0; k < tables.length; k++) {
                            values[k] = field.add(values[k], diffs[k]);
                        }
                    }
                    sums[x] = field.add(sums[x], polynomial.combine(values));
                }
            }

            const ys = field.newVectorFrom(sums.slice(0, degree + 1));
            const roundPoly = field.interpolate(xs, ys);
            if (field.evalPolyAt(roundPoly, extraX) !== sums[degree + 1]) {
                throw new DegreeViolationError(`Round ${round} polynomial exceeds the declared degree bound of ${degree}`);
            }

            const coefficients = roundPoly.toValues();
            rounds.push(coefficients);
            transcript.appendScalars(`${label}_round_${round}`, coefficients);
            const r = transcript.challenge(`${label}_challenge_${round}`);
            point.push(r);

            tables = tables.map(t => foldFirst(field, t, r));
        }

        const tableValues = tables.map(t => t[0]);
        const finalClaim = polynomial.combine(tableValues);
        return { proof: { rounds, finalClaim }, point, tableValues };
    }
}

// VERIFIER
// ================================================================================================
export class SumCheckVerifier {

    readonly field: FiniteField;

    constructor(field: FiniteField) {
        this.field = field;
    }

    /**
     * Replays the rounds of a sum-check proof against a claimed sum. The returned final claim is
     * only meaningful once the caller has checked it against an evaluation of the summand.
     */
    verify(proof: SumCheckProof, claim: bigint, numVariables: number, degree: number, transcript: Transcript, label: string): SumCheckResult {
        const field = this.field;
        let accepted = (proof.rounds.length === numVariables);

        const point: bigint[] = [];
        let current = claim;
        for (let round = 0; round < numVariables; round++) {
            // missing, oversized or out-of-field rounds are replaced by the zero polynomial so
            // that every challenge is still drawn
            let coefficients = proof.rounds[round] ?? [];
            if (coefficients.length === 0 || coefficients.length > degree + 1
                || !coefficients.every(c => isFieldElement(field, c))) {
                accepted = false;
                coefficients = [field.zero];
            }

            let sum = field.add(hornerEval(field, coefficients, field.zero), hornerEval(field, coefficients, field.one));
            if (sum !== current) {
                accepted = false;
            }

            transcript.appendScalars(`${label}_round_${round}`, coefficients);
            let r = transcript.challenge(`${label}_challenge_${round}`);
            point.push(r);
            current = hornerEval(field, coefficients, r);
        }

        if (!isFieldElement(field, proof.finalClaim) || current !== proof.finalClaim) {
            accepted = false;
        }

        return { accepted, point, finalClaim: proof.finalClaim };
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function range(field: FiniteField, count: number): bigint[] {
    const result = new Array<bigint>(count);
    for (let i = 0; i < count; i++) {
        result[i] = (i === 0) ? field.zero : field.add(result[i - 1], field.one);
    }
    return result;
}
