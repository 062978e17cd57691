import { expect } from 'chai';
import { setup, instantiateShout, instantiateTwist } from '../index';
import { LookupTable } from '../lib/traces/LookupTable';
import { MemoryTrace } from '../lib/traces/MemoryTrace';
import { field } from '../lib/backend';
import { IndexOutOfBoundsError, SizeMismatchError } from '../lib/MemoryCheckError';
import { Shout } from '../lib/Shout';
import { Logger, hornerEval } from '../lib/utils';
import { Transcript, drawReadCheckChallenges, getReadCheckClaim } from '../lib/components';
import { liftRoundPolynomial } from './helpers';
import type { ShoutProof } from '../twistshout';

describe('Shout', () => {

    const secret = Buffer.from('test-secret');
    const { proverKey, verifierKey } = setup(2, { logMaxOperations: 2, secret });
    const shout = instantiateShout(null);

    describe('prove() and verify()', () => {
        it('should accept lookups into a padded table', () => {
            const table = new LookupTable([1n, 4n, 9n]);
            expect(table.size).to.equal(4);
            expect(table.lookup(1)).to.equal(4n);

            const proof = shout.prove(proverKey, table);
            expect(proof.logCycles).to.equal(1);
            expect(shout.verify(verifierKey, proof)).to.be.true;
        });

        it('should accept several lookups, padding included', () => {
            const table = new LookupTable([1n, 4n, 9n]);
            table.lookup(2);
            table.lookup(3);
            table.lookup(0);

            const proof = shout.prove(proverKey, table);
            expect(proof.logCycles).to.equal(2);
            expect(shout.verify(verifierKey, proof)).to.be.true;
        });

        it('should accept a table without lookups', () => {
            const proof = shout.prove(proverKey, new LookupTable([5n, 6n]));
            expect(shout.verify(verifierKey, proof)).to.be.true;
        });

        it('should reject a lookup that does not return the table entry', () => {
            const table = LookupTable.withLookups([1n, 4n, 9n], [{ index: 2, value: 8n }]);
            const proof = shout.prove(proverKey, table);
            expect(shout.verify(verifierKey, proof)).to.be.false;
        });

        it('should reject a proof whose openings were altered', () => {
            const table = new LookupTable([1n, 4n, 9n]);
            table.lookup(1);
            const proof = shout.prove(proverKey, table);

            const tamperedTable: ShoutProof = {
                ...proof,
                tableOpening: { ...proof.tableOpening, value: field.add(proof.tableOpening.value, 1n) }
            };
            expect(shout.verify(verifierKey, tamperedTable)).to.be.false;

            const tamperedRead: ShoutProof = {
                ...proof,
                readOpening: { ...proof.readOpening, value: 9n }
            };
            expect(shout.verify(verifierKey, tamperedRead)).to.be.false;
        });

        it('should reject read-check rounds whose coefficients are not field elements', () => {
            const table = LookupTable.withLookups([1n, 4n, 9n], [{ index: 2, value: 8n }]);
            const proof = shout.prove(proverKey, table);

            // replay the transcript up to the first read-check challenge
            const transcript = new Transcript('shout', field);
            transcript.appendNumber('log_table_size', 2);
            transcript.appendNumber('log_cycles', proof.logCycles);
            transcript.appendPoint('address_commitment', proof.addressCommitment);
            transcript.appendPoint('table_commitment', proof.tableCommitment);
            transcript.appendPoint('read_commitment', proof.readCommitment);
            const challenges = drawReadCheckChallenges(transcript, 2, proof.logCycles);
            transcript.appendScalar('read_claim', proof.readOpening.value);
            const first = proof.readCheck.rounds[0];
            transcript.appendScalars('read_check_round_0', first);
            const r = transcript.challenge('read_check_challenge_0');

            const claim = getReadCheckClaim(field, proof.readOpening.value, challenges);
            const sum = field.add(hornerEval(field, first, 0n), hornerEval(field, first, 1n));
            expect(sum).to.not.equal(claim);
            const rounds = [liftRoundPolynomial(field, first, r, field.sub(claim, sum)), ...proof.readCheck.rounds.slice(1)];

            expect(shout.verify(verifierKey, { ...proof, readCheck: { ...proof.readCheck, rounds } })).to.be.false;
        });

        it('should reject a proof against another table commitment', () => {
            const table = new LookupTable([1n, 4n, 9n]);
            table.lookup(1);
            const proof = shout.prove(proverKey, table);

            const other = new LookupTable([1n, 4n, 9n, 16n]);
            other.lookup(1);
            const otherProof = shout.prove(proverKey, other);

            expect(shout.verify(verifierKey, { ...proof, tableCommitment: otherProof.tableCommitment })).to.be.false;
        });
    });

    describe('lookup validation', () => {
        it('should throw on out-of-range indexes', () => {
            const table = LookupTable.withLookups([1n, 4n, 9n], [{ index: 5, value: 0n }]);
            expect(() => shout.prove(proverKey, table)).to.throw(IndexOutOfBoundsError);
        });

        it('should throw on too many lookups', () => {
            const table = new LookupTable([1n, 4n]);
            for (let i = 0; i < 5; i++) {
                table.lookup(i % 2);
            }
            expect(() => shout.prove(proverKey, table)).to.throw(SizeMismatchError);
        });

        it('should throw on tables larger than the key supports', () => {
            const table = new LookupTable([1n, 2n, 3n, 4n, 5n]);
            expect(() => shout.prove(proverKey, table)).to.throw(SizeMismatchError);
        });
    });

    describe('sizeOf()', () => {
        it('should be smaller than a Twist proof over the same sizes', () => {
            const table = new LookupTable([1n, 4n, 9n]);
            table.lookup(1);
            table.lookup(2);

            const trace = new MemoryTrace(2);
            trace.write(1, 4n);
            trace.read(1);

            const twist = instantiateTwist(null);
            const shoutSize = shout.sizeOf(shout.prove(proverKey, table));
            const twistSize = twist.sizeOf(twist.prove(proverKey, trace));
            expect(shoutSize).to.be.lessThan(twistSize);
        });
    });

    describe('logging', () => {
        it('should report each proving stage', () => {
            const lines: string[] = [];
            const logged = new Shout(new Logger(true, line => lines.push(line), () => 0));
            const table = new LookupTable([1n, 4n, 9n]);
            table.lookup(1);
            logged.prove(proverKey, table);

            expect(lines).to.deep.equal([
                'Starting Shout proof',
                'Encoded 1 lookups into a table of size 4 in 0 ms',
                'Committed to address, table and read polynomials in 0 ms',
                '  Running read-check sum-check',
                '  Proved 3 rounds in 0 ms',
                'Computed read-check sum-check in 0 ms',
                'Computed polynomial openings in 0 ms',
                'Shout proof computed in 0 ms'
            ]);
        });
    });
});
