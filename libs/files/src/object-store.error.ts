export type ObjectStoreErrorKind =
    | 'no_such_upload'
    | 'invalid_part'
    | 'entity_too_small'
    | 'not_found'
    | 'unavailable'
    | 'unknown';

/**
 * Backend-neutral failure raised by every ObjectStore adapter.
 */
export class ObjectStoreError extends Error {
    constructor(
        public readonly kind: ObjectStoreErrorKind,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'ObjectStoreError';
    }

    static is(error: unknown, kind?: ObjectStoreErrorKind): error is ObjectStoreError {
        return error instanceof ObjectStoreError && (kind === undefined || error.kind === kind);
    }
}
