// IMPORTS
// ================================================================================================
import type { TwistProof, ShoutProof, SumCheckProof, Opening } from '../../twistshout';

// MODULE VARIABLES
// ================================================================================================
export const G1_POINT_SIZE = 48;    // compressed BLS12-381 G1 point

// PUBLIC FUNCTIONS
// ================================================================================================
export function sizeOfTwistProof(proof: TwistProof, fieldElementSize: number) {

    const header = 1;   // cycle count exponent
    const commitments = 3 * G1_POINT_SIZE;
    const readCheck = sizeOfSumCheckProof(proof.readCheck, fieldElementSize);
    const valueEvaluation = sizeOfSumCheckProof(proof.valueEvaluation, fieldElementSize);

    let openings = 0;
    openings += sizeOfOpening(proof.addressOpening, fieldElementSize);
    openings += sizeOfOpening(proof.addressCycleOpening, fieldElementSize);
    openings += sizeOfOpening(proof.readOpening, fieldElementSize);
    openings += sizeOfOpening(proof.readCycleOpening, fieldElementSize);
    openings += sizeOfOpening(proof.writeCycleOpening, fieldElementSize);

    // default value and memory claim
    const claims = 2 * fieldElementSize;

    const total = header + commitments + readCheck + valueEvaluation + openings + claims;
    return { header, commitments, readCheck, valueEvaluation, openings, claims, total };
}

export function sizeOfShoutProof(proof: ShoutProof, fieldElementSize: number) {

    const header = 1;
    const commitments = 3 * G1_POINT_SIZE;
    const readCheck = sizeOfSumCheckProof(proof.readCheck, fieldElementSize);

    let openings = 0;
    openings += sizeOfOpening(proof.addressOpening, fieldElementSize);
    openings += sizeOfOpening(proof.tableOpening, fieldElementSize);
    openings += sizeOfOpening(proof.readOpening, fieldElementSize);

    const total = header + commitments + readCheck + openings;
    return { header, commitments, readCheck, openings, total };
}

export function sizeOfSumCheckProof(proof: SumCheckProof, fieldElementSize: number): number {
    let size = 1;   // round count
    for (let round of proof.rounds) {
        size += 1;  // coefficient count
        size += round.length * fieldElementSize;
    }
    size += fieldElementSize;   // final claim
    return size;
}

export function sizeOfOpening(opening: Opening, fieldElementSize: number): number {
    let size = fieldElementSize;    // value
    size += 1;                      // quotient count
    size += opening.proof.quotients.length * G1_POINT_SIZE;
    return size;
}
