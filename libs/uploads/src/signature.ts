import { createHash } from 'crypto';
import { SIGNATURE_LENGTH } from './constants';
import { InvalidArgumentError } from './errors';

const SIGNATURE_PATTERN = new RegExp(`^[0-9a-f]{${SIGNATURE_LENGTH}}$`);

export type FileSignature = string;

/**
 * Fingerprint of a file's client-observable identity.
 *
 * The first 8 bytes of SHA-256 over `"{name}:{size}:{lastModifiedMillis}"`,
 * hex encoded. Browsers compute the same value with `crypto.subtle.digest`,
 * so the input string must be built exactly like `${file.name}:${file.size}:${file.lastModified}`.
 */
export function computeFileSignature(name: string, size: number, lastModifiedMillis: number): FileSignature {
    if (!Number.isFinite(size) || size < 0) {
        throw new InvalidArgumentError(`File size must be a non-negative number, got ${size}`);
    }
    if (!Number.isFinite(lastModifiedMillis) || lastModifiedMillis < 0) {
        throw new InvalidArgumentError(`Last-modified time must be a non-negative number, got ${lastModifiedMillis}`);
    }

    return createHash('sha256')
        .update(`${name}:${size}:${lastModifiedMillis}`, 'utf8')
        .digest('hex')
        .slice(0, SIGNATURE_LENGTH);
}

export function isFileSignature(value: string): value is FileSignature {
    return SIGNATURE_PATTERN.test(value);
}
