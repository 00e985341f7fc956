import { MAX_KEY_LENGTH, UPLOADS_PREFIX } from './constants';
import { InvalidArgumentError, KeyTooLongError, MalformedKeyError } from './errors';
import { FileSignature } from './signature';

export interface DecodedObjectKey {
    signature: FileSignature;
    fileName: string;
}

export function signaturePrefix(signature: FileSignature): string {
    return `${UPLOADS_PREFIX}${signature}/`;
}

/**
 * Builds `uploads/{signature}/{urlEncodedFileName}`.
 */
export function encodeObjectKey(signature: FileSignature, fileName: string): string {
    if (fileName.length === 0) {
        throw new InvalidArgumentError('File name must not be empty');
    }

    const key = `${signaturePrefix(signature)}${encodeURIComponent(fileName)}`;
    const byteLength = Buffer.byteLength(key, 'utf8');
    if (byteLength > MAX_KEY_LENGTH) {
        throw new KeyTooLongError(byteLength, MAX_KEY_LENGTH);
    }
    return key;
}

export function decodeObjectKey(key: string): DecodedObjectKey {
    if (!key.startsWith(UPLOADS_PREFIX)) {
        throw new MalformedKeyError(key, `expected the "${UPLOADS_PREFIX}" prefix`);
    }

    const segments = key.split('/');
    if (segments.length !== 3) {
        throw new MalformedKeyError(key, `expected 3 segments, found ${segments.length}`);
    }

    const [, signature, encodedName] = segments;
    if (!signature || !encodedName) {
        throw new MalformedKeyError(key, 'empty signature or file name segment');
    }

    let fileName: string;
    try {
        fileName = decodeURIComponent(encodedName);
    } catch (err) {
        throw new MalformedKeyError(key, `file name is not valid percent-encoding (${err instanceof Error ? err.message : String(err)})`);
    }

    return { signature, fileName };
}
