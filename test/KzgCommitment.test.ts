import { expect } from 'chai';
import { field, bls12381 } from '../lib/backend';
import { KzgCommitment, MultilinearPolynomial } from '../lib/components';
import { SizeMismatchError, UnsupportedSizeError } from '../lib/MemoryCheckError';

describe('KzgCommitment', () => {

    const secret = Buffer.from('test-secret');
    const scheme = new KzgCommitment(field, bls12381);
    const { proverKey, verifierKey } = scheme.setup(3, secret);

    const poly = MultilinearPolynomial.fromEvaluations(field, [3n, 1n, 4n, 1n, 5n, 9n, 2n, 6n]);
    const point = [2n, 3n, 5n];

    describe('setup()', () => {
        it('should be a pure function of the size and the secret', () => {
            const other = scheme.setup(3, secret);
            expect(scheme.commit(other.proverKey, poly).equals(scheme.commit(proverKey, poly))).to.be.true;
        });

        it('should depend on the secret', () => {
            const other = scheme.setup(3, Buffer.from('another-test-secret'));
            expect(scheme.commit(other.proverKey, poly).equals(scheme.commit(proverKey, poly))).to.be.false;
        });

        it('should reject unsupported sizes', () => {
            expect(() => scheme.setup(0, secret)).to.throw(UnsupportedSizeError);
            expect(() => scheme.setup(25, secret)).to.throw(UnsupportedSizeError);
        });

        it('should produce frozen keys', () => {
            expect(Object.isFrozen(proverKey)).to.be.true;
            expect(Object.isFrozen(verifierKey)).to.be.true;
        });
    });

    describe('open() and verify()', () => {
        it('should accept a correct opening', () => {
            const commitment = scheme.commit(proverKey, poly);
            const opening = scheme.open(proverKey, poly, point);
            expect(opening.value).to.equal(poly.evaluate(point));
            expect(opening.proof.quotients.length).to.equal(3);
            expect(scheme.verify(verifierKey, commitment, point, opening.value, opening.proof)).to.be.true;
        });

        it('should reject a tampered value', () => {
            const commitment = scheme.commit(proverKey, poly);
            const opening = scheme.open(proverKey, poly, point);
            const value = field.add(opening.value, 1n);
            expect(scheme.verify(verifierKey, commitment, point, value, opening.proof)).to.be.false;
        });

        it('should reject a tampered point', () => {
            const commitment = scheme.commit(proverKey, poly);
            const opening = scheme.open(proverKey, poly, point);
            expect(scheme.verify(verifierKey, commitment, [2n, 3n, 6n], opening.value, opening.proof)).to.be.false;
        });

        it('should reject tampered quotients', () => {
            const commitment = scheme.commit(proverKey, poly);
            const opening = scheme.open(proverKey, poly, point);
            const [q0, q1, q2] = opening.proof.quotients;
            expect(scheme.verify(verifierKey, commitment, point, opening.value, { quotients: [q1, q0, q2] })).to.be.false;
            expect(scheme.verify(verifierKey, commitment, point, opening.value, { quotients: [q0, q1] })).to.be.false;
        });

        it('should reject an opening against another commitment', () => {
            const other = MultilinearPolynomial.fromEvaluations(field, [2n, 7n, 1n, 8n, 2n, 8n, 1n, 8n]);
            const commitment = scheme.commit(proverKey, other);
            const opening = scheme.open(proverKey, poly, point);
            expect(scheme.verify(verifierKey, commitment, point, opening.value, opening.proof)).to.be.false;
        });

        it('should verify openings of sparse polynomials', () => {
            const sparse = MultilinearPolynomial.fromSparse(field, 3, [[2, 1n], [7, 5n]]);
            const commitment = scheme.commit(proverKey, sparse);
            expect(commitment.equals(scheme.commit(proverKey, sparse.toDense()))).to.be.true;

            const opening = scheme.open(proverKey, sparse, point);
            expect(scheme.verify(verifierKey, commitment, point, opening.value, opening.proof)).to.be.true;
        });

        it('should throw on polynomials that do not match the key', () => {
            const small = MultilinearPolynomial.fromEvaluations(field, [1n, 2n, 3n, 4n]);
            expect(() => scheme.commit(proverKey, small)).to.throw(SizeMismatchError);
            expect(() => scheme.open(proverKey, small, [1n, 2n])).to.throw(SizeMismatchError);
            expect(() => scheme.open(proverKey, poly, [1n, 2n])).to.throw(SizeMismatchError);
        });
    });

    describe('trimProverKey() and trimVerifierKey()', () => {
        it('should produce keys for smaller polynomials', () => {
            const small = MultilinearPolynomial.fromEvaluations(field, [1n, 2n, 3n, 4n]);
            const pk = scheme.trimProverKey(proverKey, 2);
            const vk = scheme.trimVerifierKey(verifierKey, 2);

            const commitment = scheme.commit(pk, small);
            const opening = scheme.open(pk, small, [7n, 8n]);
            expect(scheme.verify(vk, commitment, [7n, 8n], opening.value, opening.proof)).to.be.true;
            expect(scheme.verify(verifierKey, commitment, [7n, 8n], opening.value, opening.proof)).to.be.false;
        });

        it('should reject sizes above the key size', () => {
            expect(() => scheme.trimProverKey(proverKey, 4)).to.throw(UnsupportedSizeError);
            expect(() => scheme.trimVerifierKey(verifierKey, 4)).to.throw(UnsupportedSizeError);
        });
    });

    describe('batchVerify()', () => {
        it('should accept only when every claim holds', () => {
            const commitment = scheme.commit(proverKey, poly);
            const first = scheme.open(proverKey, poly, point);
            const second = scheme.open(proverKey, poly, [1n, 0n, 1n]);
            expect(second.value).to.equal(9n);

            const claims = [
                { commitment, point, value: first.value, proof: first.proof },
                { commitment, point: [1n, 0n, 1n], value: second.value, proof: second.proof }
            ];
            expect(scheme.batchVerify(verifierKey, claims)).to.be.true;

            claims[1] = { ...claims[1], value: 8n };
            expect(scheme.batchVerify(verifierKey, claims)).to.be.false;
        });
    });
});

describe('bls12381 backend', () => {

    const { g1, g2, g1Zero } = bls12381;

    it('should combine points with scalars', () => {
        const points = [g1, g1.multiply(2n), g1.multiply(5n)];
        expect(bls12381.msm(points, [3n, 0n, 4n]).equals(g1.multiply(23n))).to.be.true;
        expect(bls12381.msm([], []).equals(g1Zero)).to.be.true;
        expect(() => bls12381.msm(points, [1n])).to.throw(Error);
    });

    it('should compare pairing products', () => {
        expect(bls12381.pairingCheck([[g1.multiply(6n), g2]], [[g1.multiply(2n), g2.multiply(3n)]])).to.be.true;
        expect(bls12381.pairingCheck([[g1.multiply(6n), g2]], [[g1.multiply(2n), g2.multiply(4n)]])).to.be.false;
        expect(bls12381.pairingCheck([[g1, g2], [g1, g2]], [[g1.multiply(2n), g2]])).to.be.true;
    });

    it('should treat pairings with the identity as 1', () => {
        expect(bls12381.pairingCheck([[g1Zero, g2]], [])).to.be.true;
        expect(bls12381.pairingCheck([[g1Zero, g2]], [[g1, g2]])).to.be.false;
    });
});
