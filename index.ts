// IMPORTS
// ================================================================================================
import type { SetupOptions, ProverKey, VerifierKey, Logger } from './twistshout';
import { Twist } from './lib/Twist';
import { Shout } from './lib/Shout';
import { KzgCommitment } from './lib/components';
import { field, bls12381 } from './lib/backend';
import { parseSetupOptions } from './lib/config';
import { Logger as ConsoleLogger, noopLogger } from './lib/utils';

// RE-EXPORTS
// ================================================================================================
export { Twist } from './lib/Twist';
export { Shout } from './lib/Shout';
export { MemoryTrace } from './lib/traces/MemoryTrace';
export { LookupTable } from './lib/traces/LookupTable';
export {
    Transcript, MultilinearPolynomial, KzgCommitment, SumCheckProver, SumCheckVerifier,
    eq, eqTable, oneHot, oneHotPolynomial, lessThan, lessThanTable, lessThanBits
} from './lib/components';
export {
    MemoryCheckError, ShapeMismatchError, SizeMismatchError, DegreeViolationError, TraceOutOfBoundsError,
    IndexOutOfBoundsError, UnsupportedSizeError
} from './lib/MemoryCheckError';
export { field, bls12381 } from './lib/backend';
export { Logger as ConsoleLogger, noopLogger } from './lib/utils';
export { createPrimeField } from '@guildofweavers/galois';
export type {
    FiniteField, G1Point, G2Point, HashAlgorithm, SetupOptions, ProverKey, VerifierKey, KzgProverKey, KzgVerifierKey,
    Commitment, Opening, OpeningProof, OpeningClaim, CommitmentScheme, MultilinearOracle, SumCheckProof, SumCheckResult,
    MemoryOperation, MemoryOperationType, LookupOperation, TwistProof, ShoutProof, Logger, LogFunction
} from './twistshout';

// PUBLIC FUNCTIONS
// ================================================================================================
/**
 * Derives prover and verifier keys for memories of 2^logMemorySize cells and traces of up to
 * 2^logMaxOperations cycles.
 */
export function setup(logMemorySize: number, options?: Partial<SetupOptions>): { proverKey: ProverKey, verifierKey: VerifierKey } {
    const config = parseSetupOptions(logMemorySize, options);

    const scheme = new KzgCommitment(field, bls12381);
    const keys = scheme.setup(config.logMemorySize + config.logMaxOperations, config.secret);

    const proverKey: ProverKey = Object.freeze({
        logMemorySize       : config.logMemorySize,
        logMaxOperations    : config.logMaxOperations,
        hashAlgorithm       : config.hashAlgorithm,
        commitmentKey       : keys.proverKey
    });
    const verifierKey: VerifierKey = Object.freeze({
        logMemorySize       : config.logMemorySize,
        logMaxOperations    : config.logMaxOperations,
        hashAlgorithm       : config.hashAlgorithm,
        commitmentKey       : keys.verifierKey
    });

    return { proverKey, verifierKey };
}

export function instantiateTwist(logger?: Logger | null): Twist {
    return new Twist(resolveLogger(logger));
}

export function instantiateShout(logger?: Logger | null): Shout {
    return new Shout(resolveLogger(logger));
}

// HELPER FUNCTIONS
// ================================================================================================
function resolveLogger(logger: Logger | null | undefined): Logger {
    if (logger === null) {
        return noopLogger;
    }
    else if (logger === undefined) {
        return new ConsoleLogger();
    }
    return logger;
}
