// IMPORTS
// ================================================================================================
import type {
    FiniteField, ProverKey, VerifierKey, ShoutProof, CommitmentScheme, KzgProverKey, KzgVerifierKey, Logger
} from '../twistshout';
import {
    Transcript, MultilinearPolynomial, KzgCommitment, SumCheckProver, SumCheckVerifier, READ_CHECK_DEGREE,
    drawReadCheckChallenges, buildReadCheckPolynomial, getReadCheckClaim, evaluateReadCheckSummand, repeatOverCycles
} from './components';
import type { SumCheckProverResult } from './components';
import { LookupTable } from './traces/LookupTable';
import { field as scalarField, bls12381 } from './backend';
import { isFieldElement, log2Ceil, sizeOfShoutProof } from './utils';
import { MemoryCheckError, IndexOutOfBoundsError, SizeMismatchError } from './MemoryCheckError';

// MODULE VARIABLES
// ================================================================================================
const TRANSCRIPT_LABEL = 'shout';

// CLASS DEFINITION
// ================================================================================================
/**
 * Read-only counterpart of Twist: lookups select entries of a fixed table, so one sum-check over
 * the one-hot lookup matrix suffices and no increments or ordering are involved.
 */
export class Shout {

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
    prove(key: ProverKey, table: LookupTable): ShoutProof {

        const log = this.logger.start('Starting Shout proof');

        // 0 ----- validate parameters
        const logTableSize = key.logMemorySize;
        if (table.logSize > logTableSize) {
            throw new SizeMismatchError(`Table of size ${table.size} exceeds key table size 2^${logTableSize}`);
        }
        const maxLookups = 2 ** key.logMaxOperations;
        if (table.lookups.length > maxLookups) {
            throw new SizeMismatchError(`Table has ${table.lookups.length} lookups, but at most ${maxLookups} are supported`);
        }
        for (let entry of table.entries) {
            if (!isFieldElement(this.field, entry)) {
                throw new IndexOutOfBoundsError(`Table entry ${entry} is not a field element`);
            }
        }
        for (let lookup of table.lookups) {
            if (!Number.isInteger(lookup.index) || lookup.index < 0 || lookup.index >= table.size) {
                throw new IndexOutOfBoundsError(`Lookup index ${lookup.index} is outside of table of size ${table.size}`);
            }
            if (!isFieldElement(this.field, lookup.value)) {
                throw new IndexOutOfBoundsError(`Lookup value ${lookup.value} is not a field element`);
            }
        }

        const logCycles = Math.max(log2Ceil(table.lookups.length), 1);
        const addressKey = this.scheme.trimProverKey(key.commitmentKey, logTableSize + logCycles);
        const tableKey = this.scheme.trimProverKey(key.commitmentKey, logTableSize);
        const cycleKey = this.scheme.trimProverKey(key.commitmentKey, logCycles);

        // 1 ----- encode lookups; padding cycles look up index 0
        const tableSize = 2 ** logTableSize;
        const cycleCount = 2 ** logCycles;
        const entries = table.entries.slice();
        while (entries.length < tableSize) {
            entries.push(this.field.zero);
        }

        const addressEntries: [number, bigint][] = [];
        const reads = new Array<bigint>(cycleCount);
        for (let j = 0; j < cycleCount; j++) {
            let lookup = table.lookups[j];
            let index = (lookup === undefined) ? 0 : lookup.index;
            addressEntries.push([j * tableSize + index, this.field.one]);
            reads[j] = (lookup === undefined) ? entries[0] : lookup.value;
        }

        const addressPoly = MultilinearPolynomial.fromSparse(this.field, logTableSize + logCycles, addressEntries);
        const tablePoly = MultilinearPolynomial.fromEvaluations(this.field, entries);
        const readPoly = MultilinearPolynomial.fromEvaluations(this.field, reads);
        log(`Encoded ${table.lookups.length} lookups into a table of size ${tableSize}`);

        // 2 ----- commit to lookups, table and read values
        const addressCommitment = this.scheme.commit(addressKey, addressPoly);
        const tableCommitment = this.scheme.commit(tableKey, tablePoly);
        const readCommitment = this.scheme.commit(cycleKey, readPoly);
        log('Committed to address, table and read polynomials');

        const transcript = new Transcript(TRANSCRIPT_LABEL, this.field, key.hashAlgorithm);
        transcript.appendNumber('log_table_size', logTableSize);
        transcript.appendNumber('log_cycles', logCycles);
        transcript.appendPoint('address_commitment', addressCommitment);
        transcript.appendPoint('table_commitment', tableCommitment);
        transcript.appendPoint('read_commitment', readCommitment);

        // 3 ----- reduce lookup correctness and one-hot addressing to a point ρ
        const challenges = drawReadCheckChallenges(transcript, logTableSize, logCycles);
        const readOpening = this.scheme.open(cycleKey, readPoly, challenges.rCycle);
        transcript.appendScalar('read_claim', readOpening.value);

        let readCheck: SumCheckProverResult;
        const readLogger = this.logger.sub('Running read-check sum-check');
        try {
            const memory = repeatOverCycles(entries, cycleCount);
            const polynomial = buildReadCheckPolynomial(this.field, addressPoly, memory, challenges);
            readCheck = this.prover.prove(polynomial, transcript, 'read_check');
            readLogger(`Proved ${logTableSize + logCycles} rounds`);
        }
        catch (error) {
            throw new MemoryCheckError('Read-check sum-check failed', error);
        }
        finally {
            this.logger.done(readLogger);
        }
        const rho = readCheck.point;
        transcript.appendScalar('read_check_final', readCheck.proof.finalClaim);
        log('Computed read-check sum-check');

        // 4 ----- open lookups at ρ and the table at ρₖ
        const addressOpening = this.scheme.open(addressKey, addressPoly, rho);
        const tableOpening = this.scheme.open(tableKey, tablePoly, rho.slice(0, logTableSize));
        log('Computed polynomial openings');

        this.logger.done(log, 'Shout proof computed');

        return {
            logCycles, addressCommitment, tableCommitment, readCommitment,
            readCheck: readCheck.proof,
            addressOpening, tableOpening, readOpening
        };
    }

    // VERIFIER
    // --------------------------------------------------------------------------------------------
    verify(key: VerifierKey, proof: ShoutProof): boolean {

        const log = this.logger.start('Starting Shout verification');
        const field = this.field;

        try {
            // 0 ----- check proof shape
            const logTableSize = key.logMemorySize;
            const logCycles = proof.logCycles;
            if (!Number.isInteger(logCycles) || logCycles < 1 || logCycles > key.logMaxOperations) {
                this.logger.done(log, 'Shout proof rejected');
                return false;
            }
            const scalars = [
                proof.addressOpening.value, proof.tableOpening.value, proof.readOpening.value, proof.readCheck.finalClaim
            ];
            if (!scalars.every(value => isFieldElement(field, value))) {
                this.logger.done(log, 'Shout proof rejected');
                return false;
            }

            const addressKey = this.scheme.trimVerifierKey(key.commitmentKey, logTableSize + logCycles);
            const tableKey = this.scheme.trimVerifierKey(key.commitmentKey, logTableSize);
            const cycleKey = this.scheme.trimVerifierKey(key.commitmentKey, logCycles);

            // 1 ----- replay the transcript up to the read-check
            const transcript = new Transcript(TRANSCRIPT_LABEL, field, key.hashAlgorithm);
            transcript.appendNumber('log_table_size', logTableSize);
            transcript.appendNumber('log_cycles', logCycles);
            transcript.appendPoint('address_commitment', proof.addressCommitment);
            transcript.appendPoint('table_commitment', proof.tableCommitment);
            transcript.appendPoint('read_commitment', proof.readCommitment);

            const challenges = drawReadCheckChallenges(transcript, logTableSize, logCycles);
            transcript.appendScalar('read_claim', proof.readOpening.value);
            log('Replayed transcript');

            // 2 ----- check the read-check sum-check against A(ρ) and Val(ρₖ)
            const claim = getReadCheckClaim(field, proof.readOpening.value, challenges);
            const readCheck = this.verifier.verify(proof.readCheck, claim, logTableSize + logCycles, READ_CHECK_DEGREE, transcript, 'read_check');
            transcript.appendScalar('read_check_final', proof.readCheck.finalClaim);

            const rho = readCheck.point;
            const expected = evaluateReadCheckSummand(field, rho, proof.addressOpening.value, proof.tableOpening.value, challenges);
            const readCheckPassed = readCheck.accepted && (readCheck.finalClaim === expected);
            log('Checked read-check sum-check');

            // 3 ----- verify polynomial openings
            const addressOpened = this.scheme.verify(addressKey, proof.addressCommitment, rho, proof.addressOpening.value, proof.addressOpening.proof);
            const tableOpened = this.scheme.verify(tableKey, proof.tableCommitment, rho.slice(0, logTableSize), proof.tableOpening.value, proof.tableOpening.proof);
            const readOpened = this.scheme.verify(cycleKey, proof.readCommitment, challenges.rCycle, proof.readOpening.value, proof.readOpening.proof);
            log('Verified polynomial openings');

            const accepted = readCheckPassed && addressOpened && tableOpened && readOpened;
            this.logger.done(log, accepted ? 'Shout proof accepted' : 'Shout proof rejected');
            return accepted;
        }
        catch (error) {
            // malformed proofs surface as exceptions from the group or field arithmetic
            log(`Malformed proof: ${error instanceof Error ? error.message : String(error)}`);
            this.logger.done(log, 'Shout proof rejected');
            return false;
        }
    }

    // UTILITIES
    // --------------------------------------------------------------------------------------------
    sizeOf(proof: ShoutProof): number {
        const size = sizeOfShoutProof(proof, this.field.elementSize);
        return size.total;
    }
}
