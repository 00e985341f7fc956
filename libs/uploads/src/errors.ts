export enum UploadErrorCode {
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',
    KEY_TOO_LONG = 'KEY_TOO_LONG',
    MALFORMED_KEY = 'MALFORMED_KEY',
    SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
    EXPIRED_SESSION = 'EXPIRED_SESSION',
    CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
    PART_UPLOAD_FAILED = 'PART_UPLOAD_FAILED',
    COMPLETION_FAILED = 'COMPLETION_FAILED',
    ABORT_FAILED = 'ABORT_FAILED',
}

export abstract class UploadError extends Error {
    abstract readonly code: UploadErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidArgumentError extends UploadError {
    readonly code = UploadErrorCode.INVALID_ARGUMENT;
}

export class KeyTooLongError extends UploadError {
    readonly code = UploadErrorCode.KEY_TOO_LONG;

    constructor(public readonly byteLength: number, limit: number) {
        super(`Object key is ${byteLength} bytes, the limit is ${limit}`);
    }
}

export class MalformedKeyError extends UploadError {
    readonly code = UploadErrorCode.MALFORMED_KEY;

    constructor(public readonly key: string, reason: string) {
        super(`Malformed upload key "${key}": ${reason}`);
    }
}

/** The backend has no session for the identifier; the caller must init again. */
export class SessionNotFoundError extends UploadError {
    readonly code = UploadErrorCode.SESSION_NOT_FOUND;
}

/** The backend purged the session (expiry or abort) while it was in use. */
export class ExpiredSessionError extends UploadError {
    readonly code = UploadErrorCode.EXPIRED_SESSION;
}

export class CapacityExceededError extends UploadError {
    readonly code = UploadErrorCode.CAPACITY_EXCEEDED;
}

/** Transient: the caller retries the identical chunk. */
export class PartUploadFailedError extends UploadError {
    readonly code = UploadErrorCode.PART_UPLOAD_FAILED;
}

/** The session stays open; completion may be retried. */
export class CompletionFailedError extends UploadError {
    readonly code = UploadErrorCode.COMPLETION_FAILED;
}

export class AbortFailedError extends UploadError {
    readonly code = UploadErrorCode.ABORT_FAILED;
}
