import { expect } from 'chai';
import { field, bls12381 } from '../lib/backend';
import { Transcript } from '../lib/components';

describe('Transcript', () => {

    function buildTranscript(label = 'test', value = 42n) {
        const transcript = new Transcript(label, field);
        transcript.appendNumber('size', 4);
        transcript.appendScalar('value', value);
        transcript.appendPoint('point', bls12381.g1);
        return transcript;
    }

    it('should derive the same challenges from the same messages', () => {
        const a = buildTranscript(), b = buildTranscript();
        expect(a.challenges('r', 3)).to.deep.equal(b.challenges('r', 3));
        expect(a.challenge('gamma')).to.equal(b.challenge('gamma'));
    });

    it('should derive different challenges from different messages', () => {
        expect(buildTranscript('test', 42n).challenge('r')).to.not.equal(buildTranscript('test', 43n).challenge('r'));
        expect(buildTranscript('one').challenge('r')).to.not.equal(buildTranscript('two').challenge('r'));
    });

    it('should never repeat a challenge under the same label', () => {
        const transcript = buildTranscript();
        const first = transcript.challenge('r');
        const second = transcript.challenge('r');
        expect(first).to.not.equal(second);
        expect(transcript.challengeCount).to.equal(2);
    });

    it('should derive field elements', () => {
        const transcript = buildTranscript();
        for (let value of transcript.challenges('r', 8)) {
            expect(value >= 0n && value < field.characteristic).to.be.true;
        }
    });

    it('should depend on the hash algorithm', () => {
        const sha = new Transcript('test', field, 'sha256');
        const blake = new Transcript('test', field, 'blake2s256');
        expect(sha.challenge('r')).to.not.equal(blake.challenge('r'));
    });
});
