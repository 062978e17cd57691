// IMPORTS
// ================================================================================================
import * as crypto from 'crypto';
import type { FiniteField } from '@guildofweavers/galois';
import type { HashAlgorithm, G1Point } from '../../twistshout';
import { bls12381 } from '../backend';
import { writeBigInt, scalarsToBuffer } from '../utils';

// MODULE VARIABLES
// ================================================================================================
const CHALLENGE_TAG = Buffer.from('challenge');

// CLASS DEFINITION
// ================================================================================================
/**
 * Fiat-Shamir transcript. Every message the prover sends is absorbed into a running digest, and
 * every verifier challenge is derived from that digest and then absorbed as well, so prover and
 * verifier draw identical challenges when they see identical messages.
 */
export class Transcript {

    readonly field          : FiniteField;
    readonly hashAlgorithm  : HashAlgorithm;

    private state           : Buffer;
    private drawCount       : number;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(label: string, field: FiniteField, hashAlgorithm: HashAlgorithm = 'sha256') {
        this.field = field;
        this.hashAlgorithm = hashAlgorithm;
        this.state = hash(hashAlgorithm, Buffer.from(label));
        this.drawCount = 0;
    }

    // ACCESSORS
    // --------------------------------------------------------------------------------------------
    get challengeCount(): number {
        return this.drawCount;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    append(label: string, data: Buffer): void {
        const labelBytes = Buffer.from(label);
        const header = Buffer.alloc(8);
        header.writeUInt32LE(labelBytes.length, 0);
        header.writeUInt32LE(data.length, 4);
        this.state = hash(this.hashAlgorithm, Buffer.concat([this.state, header, labelBytes, data]));
    }

    appendScalar(label: string, value: bigint): void {
        const buffer = Buffer.alloc(this.field.elementSize);
        writeBigInt(value, buffer, 0, this.field.elementSize);
        this.append(label, buffer);
    }

    appendScalars(label: string, values: readonly bigint[]): void {
        this.append(label, scalarsToBuffer(values, this.field.elementSize));
    }

    appendPoint(label: string, point: G1Point): void {
        this.append(label, bls12381.toBytes(point));
    }

    appendNumber(label: string, value: number): void {
        const buffer = Buffer.alloc(4);
        buffer.writeUInt32LE(value, 0);
        this.append(label, buffer);
    }

    challenge(label: string): bigint {
        const seed = hash(this.hashAlgorithm, Buffer.concat([this.state, CHALLENGE_TAG, Buffer.from(label)]));
        const value = this.field.prng(seed);
        this.appendScalar(label, value);
        this.drawCount++;
        return value;
    }

    challenges(label: string, count: number): bigint[] {
        const result = new Array<bigint>(count);
        for (let i = 0; i < count; i++) {
            result[i] = this.challenge(`${label}_${i}`);
        }
        return result;
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function hash(algorithm: HashAlgorithm, value: Buffer): Buffer {
    return crypto.createHash(algorithm).update(value).digest();
}
