// IMPORTS
// ================================================================================================
import type {
    FiniteField, ProverKey, VerifierKey, TwistProof, CommitmentScheme, KzgProverKey, KzgVerifierKey, Logger
} from '../twistshout';
import {
    Transcript, MultilinearPolynomial, KzgCommitment, SumCheckProver, SumCheckVerifier, lessThan, lessThanTable,
    READ_CHECK_DEGREE, drawReadCheckChallenges, buildReadCheckPolynomial, getReadCheckClaim, evaluateReadCheckSummand
} from './components';
import type { SumCheckProverResult } from './components';
import { MemoryTrace } from './traces/MemoryTrace';
import { field as scalarField, bls12381 } from './backend';
import { isFieldElement, log2Ceil, sizeOfTwistProof } from './utils';
import { MemoryCheckError, SizeMismatchError, TraceOutOfBoundsError } from './MemoryCheckError';

// MODULE VARIABLES
// ================================================================================================
const TRANSCRIPT_LABEL = 'twist';
const VALUE_EVALUATION_DEGREE = 3;

// INTERFACES
// ================================================================================================
interface TraceEncoding {

    /** one-hot address matrix A(a, j) */
    readonly addresses  : MultilinearPolynomial;
    readonly reads      : MultilinearPolynomial;
    readonly writes     : MultilinearPolynomial;

    /** memory contents Val(a, j) before cycle j */
    readonly memory     : bigint[];
}

// CLASS DEFINITION
// ================================================================================================
export class Twist {

    readonly field          : FiniteField;
    readonly scheme         : CommitmentScheme<KzgProverKey, KzgVerifierKey, MultilinearPolynomial>;
    readonly logger         : Logger;

    private readonly prover     : SumCheckProver;
    private readonly verifier   : SumCheckVerifier;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(logger: Logger, scheme = new KzgCommitment(scalarField, bls12381)) {
        this.field = scalarField;
        this.scheme = scheme;
        this.logger = logger;
        this.prover = new SumCheckProver(this.field);
        this.verifier = new SumCheckVerifier(this.field);
    }

    // PROVER
    // --------------------------------------------------------------------------------------------
    prove(key: ProverKey, trace: MemoryTrace): TwistProof {

        const log = this.logger.start('Starting Twist proof');

        // 0 ----- validate parameters
        if (trace.logMemorySize > key.logMemorySize) {
            throw new SizeMismatchError(`Trace memory of size 2^${trace.logMemorySize} exceeds key memory size 2^${key.logMemorySize}`);
        }
        validateTrace(this.field, trace, key.logMaxOperations);

        const logMemorySize = key.logMemorySize;
        const logCycles = Math.max(log2Ceil(trace.length), 1);
        const addressKey = this.scheme.trimProverKey(key.commitmentKey, logMemorySize + logCycles);
        const cycleKey = this.scheme.trimProverKey(key.commitmentKey, logCycles);

        // 1 ----- encode the trace as multilinear polynomials
        const encoding = encodeTrace(this.field, trace, logMemorySize, logCycles);
        log(`Encoded ${trace.operations.length} operations over 2^${logCycles} cycles`);

        // 2 ----- commit to addresses, read values and write values
        const addressCommitment = this.scheme.commit(addressKey, encoding.addresses);
        const readCommitment = this.scheme.commit(cycleKey, encoding.reads);
        const writeCommitment = this.scheme.commit(cycleKey, encoding.writes);
        log('Committed to address, read and write polynomials');

        const transcript = new Transcript(TRANSCRIPT_LABEL, this.field, key.hashAlgorithm);
        transcript.appendNumber('log_memory_size', logMemorySize);
        transcript.appendNumber('log_cycles', logCycles);
        transcript.appendScalar('default_value', trace.defaultValue);
        transcript.appendPoint('address_commitment', addressCommitment);
        transcript.appendPoint('read_commitment', readCommitment);
        transcript.appendPoint('write_commitment', writeCommitment);

        // 3 ----- reduce read correctness and one-hot addressing to a point ρ
        const challenges = drawReadCheckChallenges(transcript, logMemorySize, logCycles);
        const readOpening = this.scheme.open(cycleKey, encoding.reads, challenges.rCycle);
        transcript.appendScalar('read_claim', readOpening.value);

        let readCheck: SumCheckProverResult;
        const readLogger = this.logger.sub('Running read-check sum-check');
        try {
            const polynomial = buildReadCheckPolynomial(this.field, encoding.addresses, encoding.memory, challenges);
            readCheck = this.prover.prove(polynomial, transcript, 'read_check');
            readLogger(`Proved ${logMemorySize + logCycles} rounds`);
        }
        catch (error) {
            throw new MemoryCheckError('Read-check sum-check failed', error);
        }
        finally {
            this.logger.done(readLogger);
        }
        const rho = readCheck.point;
        const memoryClaim = readCheck.tableValues[2];
        transcript.appendScalar('read_check_final', readCheck.proof.finalClaim);
        transcript.appendScalar('memory_claim', memoryClaim);
        log('Computed read-check sum-check');

        // 4 ----- reduce Val(ρ) to evaluations of A, rv and wv at a cycle point σ
        const rhoAddress = rho.slice(0, logMemorySize);
        const rhoCycle = rho.slice(logMemorySize);

        let valueEvaluation: SumCheckProverResult;
        const valueLogger = this.logger.sub('Running value-evaluation sum-check');
        try {
            const increments = encoding.writes.add(encoding.reads.scale(this.field.neg(this.field.one)));
            valueEvaluation = this.prover.prove({
                numVariables    : logCycles,
                degree          : VALUE_EVALUATION_DEGREE,
                tables          : [
                    encoding.addresses.bindMany(rhoAddress).toEvaluations(),
                    increments.toEvaluations(),
                    lessThanTable(this.field, rhoCycle)
                ],
                combine: ([a, inc, lt]: readonly bigint[]) => this.field.mul(this.field.mul(a, inc), lt)
            }, transcript, 'value_evaluation');
            valueLogger(`Proved ${logCycles} rounds`);
        }
        catch (error) {
            throw new MemoryCheckError('Value-evaluation sum-check failed', error);
        }
        finally {
            this.logger.done(valueLogger);
        }
        const sigma = valueEvaluation.point;
        transcript.appendScalar('value_evaluation_final', valueEvaluation.proof.finalClaim);
        log('Computed value-evaluation sum-check');

        // 5 ----- open committed polynomials at ρ and σ
        const addressOpening = this.scheme.open(addressKey, encoding.addresses, rho);
        const addressCycleOpening = this.scheme.open(addressKey, encoding.addresses, rhoAddress.concat(sigma));
        const readCycleOpening = this.scheme.open(cycleKey, encoding.reads, sigma);
        const writeCycleOpening = this.scheme.open(cycleKey, encoding.writes, sigma);
        log('Computed polynomial openings');

        this.logger.done(log, 'Twist proof computed');

        return {
            logCycles, addressCommitment, readCommitment, writeCommitment,
            defaultValue        : trace.defaultValue,
            readCheck           : readCheck.proof,
            memoryClaim,
            valueEvaluation     : valueEvaluation.proof,
            addressOpening, addressCycleOpening, readOpening, readCycleOpening, writeCycleOpening
        };
    }

    // VERIFIER
    // --------------------------------------------------------------------------------------------
    verify(key: VerifierKey, proof: TwistProof): boolean {

        const log = this.logger.start('Starting Twist verification');
        const field = this.field;

        try {
            // 0 ----- check proof shape
            const logMemorySize = key.logMemorySize;
            const logCycles = proof.logCycles;
            if (!Number.isInteger(logCycles) || logCycles < 1 || logCycles > key.logMaxOperations) {
                this.logger.done(log, 'Twist proof rejected');
                return false;
            }
            const scalars = [
                proof.defaultValue, proof.memoryClaim, proof.addressOpening.value, proof.addressCycleOpening.value,
                proof.readOpening.value, proof.readCycleOpening.value, proof.writeCycleOpening.value,
                proof.readCheck.finalClaim, proof.valueEvaluation.finalClaim
            ];
            if (!scalars.every(value => isFieldElement(field, value))) {
                this.logger.done(log, 'Twist proof rejected');
                return false;
            }

            const addressKey = this.scheme.trimVerifierKey(key.commitmentKey, logMemorySize + logCycles);
            const cycleKey = this.scheme.trimVerifierKey(key.commitmentKey, logCycles);

            // 1 ----- replay the transcript up to the read-check
            const transcript = new Transcript(TRANSCRIPT_LABEL, field, key.hashAlgorithm);
            transcript.appendNumber('log_memory_size', logMemorySize);
            transcript.appendNumber('log_cycles', logCycles);
            transcript.appendScalar('default_value', proof.defaultValue);
            transcript.appendPoint('address_commitment', proof.addressCommitment);
            transcript.appendPoint('read_commitment', proof.readCommitment);
            transcript.appendPoint('write_commitment', proof.writeCommitment);

            const challenges = drawReadCheckChallenges(transcript, logMemorySize, logCycles);
            transcript.appendScalar('read_claim', proof.readOpening.value);
            log('Replayed transcript');

            // 2 ----- check the read-check sum-check against A(ρ) and Val(ρ)
            const claim = getReadCheckClaim(field, proof.readOpening.value, challenges);
            const readCheck = this.verifier.verify(proof.readCheck, claim, logMemorySize + logCycles, READ_CHECK_DEGREE, transcript, 'read_check');
            transcript.appendScalar('read_check_final', proof.readCheck.finalClaim);
            transcript.appendScalar('memory_claim', proof.memoryClaim);

            const rho = readCheck.point;
            const expectedReadCheck = evaluateReadCheckSummand(field, rho, proof.addressOpening.value, proof.memoryClaim, challenges);
            const readCheckPassed = readCheck.accepted && (readCheck.finalClaim === expectedReadCheck);
            log('Checked read-check sum-check');

            // 3 ----- check the value-evaluation sum-check against A(ρₖ, σ), rv(σ) and wv(σ)
            const rhoAddress = rho.slice(0, logMemorySize);
            const rhoCycle = rho.slice(logMemorySize);

            const valueClaim = field.sub(proof.memoryClaim, proof.defaultValue);
            const valueEvaluation = this.verifier.verify(proof.valueEvaluation, valueClaim, logCycles, VALUE_EVALUATION_DEGREE, transcript, 'value_evaluation');
            transcript.appendScalar('value_evaluation_final', proof.valueEvaluation.finalClaim);

            const sigma = valueEvaluation.point;
            const increment = field.sub(proof.writeCycleOpening.value, proof.readCycleOpening.value);
            const expectedValue = field.mul(field.mul(proof.addressCycleOpening.value, increment), lessThan(field, sigma, rhoCycle));
            const valuePassed = valueEvaluation.accepted && (valueEvaluation.finalClaim === expectedValue);
            log('Checked value-evaluation sum-check');

            // 4 ----- verify polynomial openings
            const addressOpened = this.scheme.batchVerify(addressKey, [
                { commitment: proof.addressCommitment, point: rho, ...proof.addressOpening },
                { commitment: proof.addressCommitment, point: rhoAddress.concat(sigma), ...proof.addressCycleOpening }
            ]);
            const cyclesOpened = this.scheme.batchVerify(cycleKey, [
                { commitment: proof.readCommitment, point: challenges.rCycle, ...proof.readOpening },
                { commitment: proof.readCommitment, point: sigma, ...proof.readCycleOpening },
                { commitment: proof.writeCommitment, point: sigma, ...proof.writeCycleOpening }
            ]);
            log('Verified polynomial openings');

            const accepted = readCheckPassed && valuePassed && addressOpened && cyclesOpened;
            this.logger.done(log, accepted ? 'Twist proof accepted' : 'Twist proof rejected');
            return accepted;
        }
        catch (error) {
            // malformed proofs surface as exceptions from the group or field arithmetic
            log(`Malformed proof: ${error instanceof Error ? error.message : String(error)}`);
            this.logger.done(log, 'Twist proof rejected');
            return false;
        }
    }

    // UTILITIES
    // --------------------------------------------------------------------------------------------
    sizeOf(proof: TwistProof): number {
        const size = sizeOfTwistProof(proof, this.field.elementSize);
        return size.total;
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function validateTrace(field: FiniteField, trace: MemoryTrace, logMaxOperations: number) {
    const maxCycles = 2 ** logMaxOperations;
    if (trace.length > maxCycles) {
        throw new TraceOutOfBoundsError(`Trace spans ${trace.length} cycles, but at most ${maxCycles} are supported`);
    }
    if (!isFieldElement(field, trace.defaultValue)) {
        throw new TraceOutOfBoundsError(`Default value ${trace.defaultValue} is not a field element`);
    }

    let previous = -1;
    for (let op of trace.operations) {
        if (!Number.isInteger(op.address) || op.address < 0 || op.address >= trace.memorySize) {
            throw new TraceOutOfBoundsError(`Address ${op.address} is outside of memory of size ${trace.memorySize}`);
        }
        if (!Number.isInteger(op.timestamp) || op.timestamp < 0 || op.timestamp >= maxCycles) {
            throw new TraceOutOfBoundsError(`Timestamp ${op.timestamp} is outside of range [0, ${maxCycles})`);
        }
        if (op.timestamp <= previous) {
            throw new TraceOutOfBoundsError(`Timestamp ${op.timestamp} does not follow timestamp ${previous}`);
        }
        if (!isFieldElement(field, op.value)) {
            throw new TraceOutOfBoundsError(`Value ${op.value} at timestamp ${op.timestamp} is not a field element`);
        }
        previous = op.timestamp;
    }
}

/**
 * Every cycle accesses exactly one cell: a read writes back the value it claims, a write reads the
 * current value, and an idle cycle reads and writes back cell 0. Memory evolves by wv - rv, so a
 * dishonest read leaves it unchanged.
 */
function encodeTrace(field: FiniteField, trace: MemoryTrace, logMemorySize: number, logCycles: number): TraceEncoding {
    const memorySize = 2 ** logMemorySize;
    const cycleCount = 2 ** logCycles;
    const ops = trace.operations;

    const cells = new Array<bigint>(memorySize).fill(trace.defaultValue);
    const addressEntries: [number, bigint][] = [];
    const reads = new Array<bigint>(cycleCount);
    const writes = new Array<bigint>(cycleCount);
    const memory = new Array<bigint>(memorySize * cycleCount);

    let next = 0;
    for (let j = 0; j < cycleCount; j++) {
        for (let a = 0; a < memorySize; a++) {
            memory[j * memorySize + a] = cells[a];
        }

        let address = 0, read = cells[0], write = cells[0];
        const op = ops[next];
        if (op !== undefined && op.timestamp === j) {
            address = op.address;
            if (op.type === 'read') {
                read = op.value;
                write = op.value;
            }
            else {
                read = cells[address];
                write = op.value;
            }
            next++;
        }

        cells[address] = field.add(cells[address], field.sub(write, read));
        addressEntries.push([j * memorySize + address, field.one]);
        reads[j] = read;
        writes[j] = write;
    }

    return {
        addresses   : MultilinearPolynomial.fromSparse(field, logMemorySize + logCycles, addressEntries),
        reads       : MultilinearPolynomial.fromEvaluations(field, reads),
        writes      : MultilinearPolynomial.fromEvaluations(field, writes),
        memory
    };
}
