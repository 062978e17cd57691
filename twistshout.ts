// IMPORTS
// ================================================================================================
import type { bls12_381 } from '@noble/curves/bls12-381';

// RE-EXPORTS
// ================================================================================================
export type { FiniteField } from '@guildofweavers/galois';

// GROUP ELEMENTS
// ================================================================================================
export type G1Point = typeof bls12_381.G1.ProjectivePoint.BASE;
export type G2Point = typeof bls12_381.G2.ProjectivePoint.BASE;

// OPTIONS
// ================================================================================================
export type HashAlgorithm = 'sha256' | 'blake2s256';

export interface SetupOptions {

    /** log2 of the maximum number of operations in a trace; defaults to logMemorySize + 2 */
    logMaxOperations: number;

    /** Hash algorithm for the Fiat-Shamir transcript; defaults to sha256 */
    hashAlgorithm: HashAlgorithm;

    /**
     * Secret from which the structured reference string is derived. Whoever knows it can forge
     * openings; when omitted, a random one is generated and discarded.
     */
    secret: Buffer;
}

// KEYS
// ================================================================================================
export interface ProverKey {
    readonly logMemorySize      : number;
    readonly logMaxOperations   : number;
    readonly hashAlgorithm      : HashAlgorithm;
    readonly commitmentKey      : KzgProverKey;
}

export interface VerifierKey {
    readonly logMemorySize      : number;
    readonly logMaxOperations   : number;
    readonly hashAlgorithm      : HashAlgorithm;
    readonly commitmentKey      : KzgVerifierKey;
}

export interface KzgProverKey {
    readonly numVariables   : number;

    /** bases[m] holds [eq(τ', b)]₁ for every b in {0,1}^m, where τ' are the last m trapdoor values */
    readonly bases          : readonly (readonly G1Point[])[];
}

export interface KzgVerifierKey {
    readonly numVariables   : number;
    readonly g1             : G1Point;
    readonly g2             : G2Point;

    /** [τᵢ]₂ for each variable, in binding order */
    readonly tauG2          : readonly G2Point[];
}

// POLYNOMIAL COMMITMENTS
// ================================================================================================
export type Commitment = G1Point;

export interface OpeningProof {
    /** commitments to the quotient polynomials, one per variable */
    readonly quotients: readonly G1Point[];
}

export interface Opening {
    readonly value  : bigint;
    readonly proof  : OpeningProof;
}

export interface MultilinearOracle {
    readonly numVariables: number;
    evaluate(point: readonly bigint[]): bigint;
}

export interface CommitmentScheme<TProverKey, TVerifierKey, TPolynomial extends MultilinearOracle> {
    commit(key: TProverKey, polynomial: TPolynomial): Commitment;
    open(key: TProverKey, polynomial: TPolynomial, point: readonly bigint[]): Opening;
    verify(key: TVerifierKey, commitment: Commitment, point: readonly bigint[], value: bigint, proof: OpeningProof): boolean;
    batchVerify(key: TVerifierKey, claims: readonly OpeningClaim[]): boolean;

    /** Narrows keys to polynomials in exactly `numVariables` variables */
    trimProverKey(key: TProverKey, numVariables: number): TProverKey;
    trimVerifierKey(key: TVerifierKey, numVariables: number): TVerifierKey;
}

export interface OpeningClaim {
    readonly commitment : Commitment;
    readonly point      : readonly bigint[];
    readonly value      : bigint;
    readonly proof      : OpeningProof;
}

// SUM-CHECK
// ================================================================================================
export interface SumCheckProof {

    /** coefficients of each round polynomial, lowest degree first */
    readonly rounds     : readonly (readonly bigint[])[];

    /** value the prover claims for the summand at the final point */
    readonly finalClaim : bigint;
}

export interface SumCheckResult {
    readonly accepted   : boolean;
    readonly point      : bigint[];
    readonly finalClaim : bigint;
}

// TRACES
// ================================================================================================
export type MemoryOperationType = 'read' | 'write';

export interface MemoryOperation {
    readonly type       : MemoryOperationType;
    readonly address    : number;
    readonly value      : bigint;
    readonly timestamp  : number;
}

export interface LookupOperation {
    readonly index  : number;
    readonly value  : bigint;
}

// PROOFS
// ================================================================================================
export interface TwistProof {

    /** log2 of the number of cycles the trace was padded to */
    readonly logCycles          : number;

    readonly addressCommitment  : Commitment;
    readonly readCommitment     : Commitment;
    readonly writeCommitment    : Commitment;
    readonly defaultValue       : bigint;

    /** reduces read correctness, one-hot booleanity and hamming weight to a point ρ */
    readonly readCheck          : SumCheckProof;

    /** claimed memory contents Val(ρ), certified by the value-evaluation sum-check */
    readonly memoryClaim        : bigint;

    /** reduces Val(ρ) to evaluations at a cycle point σ */
    readonly valueEvaluation    : SumCheckProof;

    readonly addressOpening         : Opening;  // A(ρ)
    readonly addressCycleOpening    : Opening;  // A(ρₖ, σ)
    readonly readOpening            : Opening;  // rv(r_cycle)
    readonly readCycleOpening       : Opening;  // rv(σ)
    readonly writeCycleOpening      : Opening;  // wv(σ)
}

export interface ShoutProof {
    readonly logCycles          : number;
    readonly addressCommitment  : Commitment;
    readonly tableCommitment    : Commitment;
    readonly readCommitment     : Commitment;

    readonly readCheck          : SumCheckProof;

    readonly addressOpening     : Opening;  // A(ρ)
    readonly tableOpening       : Opening;  // Val(ρₖ)
    readonly readOpening        : Opening;  // rv(r_cycle)
}

// LOGGING
// ================================================================================================
export interface Logger {
    start(message?: string, prefix?: string) : LogFunction;
    sub(message?: string): LogFunction;
    done(log: LogFunction, message?: string): void;
}

export type LogFunction = (message: string) => void;
