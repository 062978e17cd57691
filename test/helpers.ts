import type { FiniteField } from '@guildofweavers/galois';

/**
 * Rewrites a round polynomial g into g + δ₀ + δ₁·x, with δ₀ and δ₁ chosen so that g(0) + g(1) grows
 * by `offset` while g(r) stays the same. The changes are added as multiples of 2^(8·elementSize),
 * so the coefficients keep their low-order bytes but are no longer field elements.
 */
export function liftRoundPolynomial(field: FiniteField, coefficients: readonly bigint[], r: bigint, offset: bigint): bigint[] {
    const shift = 1n << BigInt(field.elementSize * 8);
    const shiftInverse = field.inv(shift % field.characteristic);

    const rInverse = field.inv(r);
    const delta0 = field.div(offset, field.sub(field.add(field.one, field.one), rInverse));
    const delta1 = field.neg(field.mul(delta0, rInverse));

    const result = coefficients.slice();
    result[0] = coefficients[0] + field.mul(delta0, shiftInverse) * shift;
    result[1] = coefficients[1] + field.mul(delta1, shiftInverse) * shift;
    return result;
}
