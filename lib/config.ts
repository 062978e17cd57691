// IMPORTS
// ================================================================================================
import * as crypto from 'crypto';
import type { SetupOptions, HashAlgorithm } from '../twistshout';
import { MAX_KEY_VARIABLES } from './components/KzgCommitment';
import { UnsupportedSizeError } from './MemoryCheckError';

// MODULE VARIABLES
// ================================================================================================
export const MAX_LOG_MEMORY_SIZE = 16;
export const MAX_LOG_OPERATIONS = 20;

const DEFAULT_EXTRA_OPERATION_BITS = 2;     // 4x as many operations as memory cells
const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';
const HASH_ALGORITHMS: HashAlgorithm[] = ['sha256', 'blake2s256'];

const SECRET_SIZE = 32;

// PUBLIC FUNCTIONS
// ================================================================================================
export function parseSetupOptions(logMemorySize: number, options: Partial<SetupOptions> = {}): SetupOptions & { logMemorySize: number } {

    // memory size
    if (!Number.isInteger(logMemorySize) || logMemorySize < 1 || logMemorySize > MAX_LOG_MEMORY_SIZE) {
        throw new UnsupportedSizeError(`Memory size must be 2^k for an integer k between 1 and ${MAX_LOG_MEMORY_SIZE}`);
    }

    // number of operations
    const logMaxOperations = (options.logMaxOperations !== undefined)
        ? options.logMaxOperations
        : Math.min(logMemorySize + DEFAULT_EXTRA_OPERATION_BITS, MAX_LOG_OPERATIONS, MAX_KEY_VARIABLES - logMemorySize);
    if (!Number.isInteger(logMaxOperations) || logMaxOperations < 1 || logMaxOperations > MAX_LOG_OPERATIONS) {
        throw new UnsupportedSizeError(`Maximum operation count must be 2^t for an integer t between 1 and ${MAX_LOG_OPERATIONS}`);
    }

    if (logMemorySize + logMaxOperations > MAX_KEY_VARIABLES) {
        throw new UnsupportedSizeError(`Memory and operation bits together cannot exceed ${MAX_KEY_VARIABLES}`);
    }

    // hash function
    const hashAlgorithm = options.hashAlgorithm || DEFAULT_HASH_ALGORITHM;
    if (!HASH_ALGORITHMS.includes(hashAlgorithm)) {
        throw new TypeError(`Hash algorithm ${hashAlgorithm} is not supported`);
    }

    // trusted setup secret
    const secret = options.secret || crypto.randomBytes(SECRET_SIZE);
    if (!Buffer.isBuffer(secret) || secret.length === 0) {
        throw new TypeError(`Setup secret must be a non-empty buffer`);
    }

    return { logMemorySize, logMaxOperations, hashAlgorithm, secret };
}
