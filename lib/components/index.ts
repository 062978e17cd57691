export { Transcript } from './Transcript';
export { MultilinearPolynomial } from './MultilinearPolynomial';
export { eq, eqTable, oneHot, oneHotPolynomial, lessThan, lessThanTable, lessThanBits, toFieldBits } from './StructuredPolynomials';
export { KzgCommitment } from './KzgCommitment';
export { SumCheckProver, SumCheckVerifier } from './SumCheck';
export type { VirtualPolynomial, SumCheckProverResult } from './SumCheck';
export {
    READ_CHECK_DEGREE, drawReadCheckChallenges, buildReadCheckPolynomial, getReadCheckClaim, evaluateReadCheckSummand,
    spreadOverAddresses, repeatOverCycles
} from './ReadCheck';
export type { ReadCheckChallenges } from './ReadCheck';
