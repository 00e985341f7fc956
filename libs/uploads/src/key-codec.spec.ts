import { decodeObjectKey, encodeObjectKey, signaturePrefix } from './key-codec';
import { InvalidArgumentError, KeyTooLongError, MalformedKeyError } from './errors';

const SIGNATURE = 'fc2e9254cb173470';

describe('key codec', () => {
    describe('encodeObjectKey', () => {
        it('should place the url-encoded file name under the signature prefix', () => {
            expect(signaturePrefix(SIGNATURE)).toBe('uploads/fc2e9254cb173470/');
            expect(encodeObjectKey(SIGNATURE, 'my video.mp4')).toBe('uploads/fc2e9254cb173470/my%20video.mp4');
        });

        it('should encode slashes so the key keeps three segments', () => {
            expect(encodeObjectKey(SIGNATURE, 'a/b.txt')).toBe('uploads/fc2e9254cb173470/a%2Fb.txt');
        });

        it('should reject an empty file name', () => {
            expect(() => encodeObjectKey(SIGNATURE, '')).toThrow(InvalidArgumentError);
        });

        it('should reject keys longer than 1024 bytes', () => {
            // prefix is 25 bytes, so 999 name bytes is exactly the limit
            expect(encodeObjectKey(SIGNATURE, 'a'.repeat(999))).toHaveLength(1024);
            expect(() => encodeObjectKey(SIGNATURE, 'a'.repeat(1000))).toThrow(KeyTooLongError);
        });
    });

    describe('decodeObjectKey', () => {
        it('should recover signature and file name', () => {
            const names = ['report.pdf', 'my video.mp4', 'a/b.txt', 'résumé 100%.docx', '日本語.txt'];
            for (const fileName of names) {
                expect(decodeObjectKey(encodeObjectKey(SIGNATURE, fileName))).toEqual({ signature: SIGNATURE, fileName });
            }
        });

        it.each([
            ['other/fc2e9254cb173470/a.txt'],
            ['uploads/fc2e9254cb173470'],
            ['uploads/fc2e9254cb173470/'],
            ['uploads//a.txt'],
            ['uploads/fc2e9254cb173470/a/b.txt'],
            ['uploads/fc2e9254cb173470/%E0%A4%A'],
        ])('should reject %s', (key) => {
            expect(() => decodeObjectKey(key)).toThrow(MalformedKeyError);
        });
    });
});
