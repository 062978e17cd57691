// IMPORTS
// ================================================================================================
import * as crypto from 'crypto';
import type { FiniteField } from '@guildofweavers/galois';
import type {
    CommitmentScheme, Commitment, KzgProverKey, KzgVerifierKey, Opening, OpeningClaim, OpeningProof, G1Point
} from '../../twistshout';
import { GroupBackend, PairingInput } from '../backend';
import { MultilinearPolynomial } from './MultilinearPolynomial';
import { eqTable } from './StructuredPolynomials';
import { SizeMismatchError, UnsupportedSizeError } from '../MemoryCheckError';

// MODULE VARIABLES
// ================================================================================================
export const MAX_KEY_VARIABLES = 24;

const TRAPDOOR_TAG = 'multilinear-kzg-trapdoor';

// CLASS DEFINITION
// ================================================================================================
/**
 * Multilinear KZG commitments: a polynomial f in n variables is committed as [f(τ)]₁, and an
 * opening at r carries commitments to the quotients qᵢ with f(X) - f(r) = Σ (Xᵢ - rᵢ)·qᵢ(Xᵢ₊₁, ..., Xₙ).
 */
export class KzgCommitment implements CommitmentScheme<KzgProverKey, KzgVerifierKey, MultilinearPolynomial> {

    readonly field  : FiniteField;
    readonly group  : GroupBackend;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(field: FiniteField, group: GroupBackend) {
        this.field = field;
        this.group = group;
    }

    // SETUP
    // --------------------------------------------------------------------------------------------
    /**
     * Derives keys for polynomials in up to `maxVariables` variables from the provided secret.
     * The trapdoor values exist only inside this call.
     */
    setup(maxVariables: number, secret: Buffer): { proverKey: KzgProverKey, verifierKey: KzgVerifierKey } {
        if (!Number.isInteger(maxVariables) || maxVariables < 1 || maxVariables > MAX_KEY_VARIABLES) {
            throw new UnsupportedSizeError(`Commitment keys support between 1 and ${MAX_KEY_VARIABLES} variables, but ${maxVariables} were requested`);
        }

        const taus = deriveTrapdoor(this.field, secret, maxVariables);

        // bases[m] is the Lagrange basis over the last m trapdoor values
        const bases: G1Point[][] = [];
        for (let m = 0; m <= maxVariables; m++) {
            let scalars = eqTable(this.field, taus.slice(maxVariables - m));
            bases.push(scalars.map(s => (s === this.field.zero) ? this.group.g1Zero : this.group.g1.multiply(s)));
        }

        const tauG2 = taus.map(tau => this.group.g2.multiply(tau));

        const proverKey: KzgProverKey = Object.freeze({
            numVariables: maxVariables,
            bases: Object.freeze(bases.map(basis => Object.freeze(basis)))
        });
        const verifierKey: KzgVerifierKey = Object.freeze({
            numVariables: maxVariables,
            g1: this.group.g1,
            g2: this.group.g2,
            tauG2: Object.freeze(tauG2)
        });

        return { proverKey, verifierKey };
    }

    /** Narrows a prover key to polynomials in exactly `numVariables` variables */
    trimProverKey(key: KzgProverKey, numVariables: number): KzgProverKey {
        checkTrimSize(key.numVariables, numVariables);
        return Object.freeze({ numVariables, bases: key.bases.slice(0, numVariables + 1) });
    }

    /** Narrows a verifier key to polynomials in exactly `numVariables` variables */
    trimVerifierKey(key: KzgVerifierKey, numVariables: number): KzgVerifierKey {
        checkTrimSize(key.numVariables, numVariables);
        return Object.freeze({
            numVariables,
            g1: key.g1,
            g2: key.g2,
            tauG2: key.tauG2.slice(key.numVariables - numVariables)
        });
    }

    // PROVER
    // --------------------------------------------------------------------------------------------
    commit(key: KzgProverKey, polynomial: MultilinearPolynomial): Commitment {
        checkPolynomialSize(key, polynomial);
        return this.commitWithBasis(key.bases[polynomial.numVariables], polynomial);
    }

    open(key: KzgProverKey, polynomial: MultilinearPolynomial, point: readonly bigint[]): Opening {
        checkPolynomialSize(key, polynomial);
        if (point.length !== polynomial.numVariables) {
            throw new SizeMismatchError(`Opening point must have ${polynomial.numVariables} coordinates, but had ${point.length}`);
        }

        const quotients: G1Point[] = [];
        let current = polynomial;
        for (let i = 0; i < point.length; i++) {
            let quotient = current.slope();
            quotients.push(this.commitWithBasis(key.bases[quotient.numVariables], quotient));
            current = current.bind(point[i]);
        }

        return { value: current.getValue(0), proof: { quotients } };
    }

    // VERIFIER
    // --------------------------------------------------------------------------------------------
    verify(key: KzgVerifierKey, commitment: Commitment, point: readonly bigint[], value: bigint, proof: OpeningProof): boolean {
        try {
            if (point.length !== key.numVariables) return false;
            if (proof.quotients.length !== key.numVariables) return false;

            // e(C - v·G₁, G₂) = Π e(πᵢ, [τᵢ]₂ - rᵢ·G₂)
            const lhs: PairingInput[] = [[commitment.subtract(key.g1.multiplyUnsafe(value)), key.g2]];
            const rhs: PairingInput[] = [];
            for (let i = 0; i < point.length; i++) {
                let shifted = key.tauG2[i].subtract(key.g2.multiplyUnsafe(point[i]));
                rhs.push([proof.quotients[i], shifted]);
            }
            return this.group.pairingCheck(lhs, rhs);
        }
        catch {
            // points off the curve, scalars out of range and similar malformed input
            return false;
        }
    }

    batchVerify(key: KzgVerifierKey, claims: readonly OpeningClaim[]): boolean {
        let result = true;
        for (let claim of claims) {
            // every claim is checked so that the outcome does not reveal which one failed
            let valid = this.verify(key, claim.commitment, claim.point, claim.value, claim.proof);
            result = result && valid;
        }
        return result;
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private commitWithBasis(basis: readonly G1Point[], polynomial: MultilinearPolynomial): G1Point {
        const points: G1Point[] = [], scalars: bigint[] = [];
        for (let [index, value] of polynomial.nonZeroEntries()) {
            points.push(basis[index]);
            scalars.push(value);
        }
        return this.group.msm(points, scalars);
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function deriveTrapdoor(field: FiniteField, secret: Buffer, count: number): bigint[] {
    const result: bigint[] = [];
    for (let counter = 0; result.length < count; counter++) {
        let seed = crypto.createHash('sha256')
            .update(TRAPDOOR_TAG)
            .update(secret)
            .update(Buffer.from([counter & 0xFF, (counter >>> 8) & 0xFF]))
            .digest();
        let tau = field.prng(seed);
        if (tau !== field.zero) {
            result.push(tau);
        }
    }
    return result;
}

function checkPolynomialSize(key: KzgProverKey, polynomial: MultilinearPolynomial) {
    if (polynomial.numVariables !== key.numVariables) {
        throw new SizeMismatchError(`Key supports ${key.numVariables}-variable polynomials, but the polynomial has ${polynomial.numVariables} variables`);
    }
}

function checkTrimSize(available: number, requested: number) {
    if (!Number.isInteger(requested) || requested < 0 || requested > available) {
        throw new UnsupportedSizeError(`Cannot trim a ${available}-variable key to ${requested} variables`);
    }
}
