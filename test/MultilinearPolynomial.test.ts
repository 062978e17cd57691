import { expect } from 'chai';
import { field } from '../lib/backend';
import { MultilinearPolynomial } from '../lib/components';
import { ShapeMismatchError } from '../lib/MemoryCheckError';
import { toFieldBits } from '../lib/components/StructuredPolynomials';

describe('MultilinearPolynomial', () => {

    // f(x0, x1) = 1 + x0 + 2·x1
    const values = [1n, 2n, 3n, 4n];

    describe('evaluate()', () => {
        it('should return table values at boolean points', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, values);
            for (let index = 0; index < values.length; index++) {
                expect(poly.evaluate(toFieldBits(field, index, 2))).to.equal(values[index]);
            }
        });

        it('should extend the table multilinearly', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, values);
            expect(poly.evaluate([5n, 7n])).to.equal(20n);
        });

        it('should give the same result for sparse and dense tables', () => {
            const dense = MultilinearPolynomial.fromEvaluations(field, [0n, 2n, 0n, 4n]);
            const sparse = MultilinearPolynomial.fromSparse(field, 2, [[1, 2n], [3, 4n]]);
            expect(sparse.isSparse).to.be.true;
            expect(dense.evaluate([5n, 7n])).to.equal(80n);
            expect(sparse.evaluate([5n, 7n])).to.equal(80n);
        });

        it('should reject points of the wrong length', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, values);
            expect(() => poly.evaluate([1n])).to.throw(ShapeMismatchError);
        });
    });

    describe('fromEvaluations()', () => {
        it('should reject tables whose length is not a power of 2', () => {
            expect(() => MultilinearPolynomial.fromEvaluations(field, [1n, 2n, 3n])).to.throw(ShapeMismatchError);
        });
    });

    describe('fromSparse()', () => {
        it('should reject indexes outside of the hypercube', () => {
            expect(() => MultilinearPolynomial.fromSparse(field, 2, [[4, 1n]])).to.throw(ShapeMismatchError);
        });

        it('should drop zero entries', () => {
            const poly = MultilinearPolynomial.fromSparse(field, 3, [[2, 0n]]);
            expect(poly.isZero).to.be.true;
            expect(poly.getValue(2)).to.equal(0n);
        });
    });

    describe('bind()', () => {
        it('should fix the first variable', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, values).bind(5n);
            expect(poly.numVariables).to.equal(1);
            expect(poly.toEvaluations()).to.deep.equal([6n, 8n]);
        });

        it('should agree with evaluate() once every variable is bound', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, [3n, 1n, 4n, 1n, 5n, 9n, 2n, 6n]);
            const point = [11n, 13n, 17n];
            const bound = poly.bindMany(point);
            expect(bound.numVariables).to.equal(0);
            expect(bound.getValue(0)).to.equal(poly.evaluate(point));
        });

        it('should bind sparse polynomials like dense ones', () => {
            const sparse = MultilinearPolynomial.fromSparse(field, 3, [[1, 1n], [6, 1n]]);
            const dense = sparse.toDense();
            expect(sparse.bind(9n).toEvaluations()).to.deep.equal(dense.bind(9n).toEvaluations());
            expect(sparse.bindMany([9n, 4n]).evaluate([2n])).to.equal(dense.evaluate([9n, 4n, 2n]));
        });

        it('should reject binding a constant polynomial', () => {
            const constant = MultilinearPolynomial.fromEvaluations(field, [5n]);
            expect(() => constant.bind(1n)).to.throw(ShapeMismatchError);
        });
    });

    describe('across variable counts', () => {
        for (let n = 0; n <= 4; n++) {
            const table = Array.from({ length: 2 ** n }, (_, i) => BigInt(3 * i * i + 2 * i + 1));
            const point = Array.from({ length: n }, (_, i) => BigInt(5 + 11 * i + n));

            it(`should reproduce every table entry for n = ${n}`, () => {
                const poly = MultilinearPolynomial.fromEvaluations(field, table);
                expect(poly.numVariables).to.equal(n);
                for (let index = 0; index < table.length; index++) {
                    expect(poly.evaluate(toFieldBits(field, index, n))).to.equal(table[index]);
                }
            });

            it(`should bind variables one at a time to the evaluation for n = ${n}`, () => {
                const poly = MultilinearPolynomial.fromEvaluations(field, table);
                let bound = poly;
                for (let r of point) {
                    bound = bound.bind(r);
                }
                expect(bound.numVariables).to.equal(0);
                expect(bound.getValue(0)).to.equal(poly.evaluate(point));
                expect(poly.bindMany(point).getValue(0)).to.equal(poly.evaluate(point));
            });

            it(`should evaluate sparse tables like dense ones for n = ${n}`, () => {
                const entries: [number, bigint][] = [];
                table.forEach((value, index) => { if (index % 3 === 0) entries.push([index, value]); });
                const sparse = MultilinearPolynomial.fromSparse(field, n, entries);
                expect(sparse.evaluate(point)).to.equal(sparse.toDense().evaluate(point));
                expect(sparse.sum()).to.equal(entries.reduce((acc, [, value]) => field.add(acc, value), field.zero));
            });
        }
    });

    describe('slope()', () => {
        it('should return the difference along the first variable', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, values);
            expect(poly.slope().toEvaluations()).to.deep.equal([1n, 1n]);
        });

        it('should handle sparse polynomials', () => {
            const poly = MultilinearPolynomial.fromSparse(field, 2, [[0, 5n], [3, 2n]]);
            expect(poly.slope().toEvaluations()).to.deep.equal([field.neg(5n), 2n]);
        });
    });

    describe('arithmetic', () => {
        it('should sum over the hypercube', () => {
            const poly = MultilinearPolynomial.fromEvaluations(field, values);
            expect(poly.sum()).to.equal(10n);
            expect(poly.scale(3n).sum()).to.equal(30n);
        });

        it('should add sparse and dense polynomials', () => {
            const dense = MultilinearPolynomial.fromEvaluations(field, values);
            const sparse = MultilinearPolynomial.fromSparse(field, 2, [[2, 10n]]);
            expect(dense.add(sparse).toEvaluations()).to.deep.equal([1n, 2n, 13n, 4n]);
            expect(sparse.add(sparse).toEvaluations()).to.deep.equal([0n, 0n, 20n, 0n]);
        });

        it('should reject adding polynomials of different sizes', () => {
            const a = MultilinearPolynomial.zero(field, 2);
            const b = MultilinearPolynomial.zero(field, 3);
            expect(() => a.add(b)).to.throw(ShapeMismatchError);
        });
    });
});
