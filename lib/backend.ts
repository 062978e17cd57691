// IMPORTS
// ================================================================================================
import type { G1Point, G2Point } from '../twistshout';
import type { FiniteField } from '@guildofweavers/galois';
import { createPrimeField } from '@guildofweavers/galois';
import { bls12_381 } from '@noble/curves/bls12-381';

// INTERFACES
// ================================================================================================
export interface GroupBackend {
    readonly g1         : G1Point;
    readonly g2         : G2Point;
    readonly g1Zero     : G1Point;

    /** Σ scalars[i]·points[i] */
    msm(points: readonly G1Point[], scalars: readonly bigint[]): G1Point;

    /** Checks Π e(lhs[i]) == Π e(rhs[i]) */
    pairingCheck(lhs: readonly PairingInput[], rhs: readonly PairingInput[]): boolean;

    toBytes(point: G1Point): Buffer;
}

export type PairingInput = [G1Point, G2Point];

// MODULE VARIABLES
// ================================================================================================
const G1 = bls12_381.G1.ProjectivePoint;
const G2 = bls12_381.G2.ProjectivePoint;
const Fp12 = bls12_381.fields.Fp12;

type BatchPairingInput = Parameters<typeof bls12_381.pairingBatch>[0][number];

/** Order of the BLS12-381 groups; every scalar lives in the prime field of this order */
export const SCALAR_MODULUS = bls12_381.fields.Fr.ORDER;

export const field: FiniteField = createPrimeField(SCALAR_MODULUS);

export const bls12381: GroupBackend = {
    g1      : G1.BASE,
    g2      : G2.BASE,
    g1Zero  : G1.ZERO,

    msm(points: readonly G1Point[], scalars: readonly bigint[]): G1Point {
        if (points.length !== scalars.length) {
            throw new Error(`Cannot combine ${points.length} points with ${scalars.length} scalars`);
        }
        if (points.length === 0) return G1.ZERO;
        return G1.msm(points.slice(), scalars.slice());
    },

    pairingCheck(lhs: readonly PairingInput[], rhs: readonly PairingInput[]): boolean {
        // Π e(lhs)·Π e(-rhs) == 1 under a single final exponentiation
        const pairs: BatchPairingInput[] = [];
        for (let [p, q] of lhs) {
            if (isPairable(p, q)) pairs.push({ g1: p, g2: q });
        }
        for (let [p, q] of rhs) {
            if (isPairable(p, q)) pairs.push({ g1: p.negate(), g2: q });
        }
        if (pairs.length === 0) return true;
        return Fp12.eql(bls12_381.pairingBatch(pairs), Fp12.ONE);
    },

    toBytes(point: G1Point): Buffer {
        return Buffer.from(point.toRawBytes(true));
    }
};

// HELPER FUNCTIONS
// ================================================================================================
function isPairable(p: G1Point, q: G2Point): boolean {
    // e(O, Q) = e(P, O) = 1; the pairing routine rejects the identity outright
    return !p.equals(G1.ZERO) && !q.equals(G2.ZERO);
}
