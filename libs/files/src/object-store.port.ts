export const OBJECT_STORE = Symbol('OBJECT_STORE');

export interface MultipartUploadRecord {
    key: string;
    uploadId: string;
    initiatedAt?: Date;
}

/**
 * Position to continue a multipart upload listing from.
 * Mirrors the key/upload-id marker pair S3 hands back on truncated pages.
 */
export interface UploadListCursor {
    keyMarker: string;
    uploadIdMarker?: string;
}

export interface MultipartUploadPage {
    uploads: MultipartUploadRecord[];
    nextCursor?: UploadListCursor;
}

export interface PartRecord {
    partNumber: number;
    eTag: string;
    size: number;
}

export interface PartPage {
    parts: PartRecord[];
    nextPartNumberMarker?: number;
}

export interface CompletedPartRef {
    partNumber: number;
    eTag: string;
}

export interface CompletedObject {
    key: string;
    location?: string;
    eTag?: string;
}

export interface ObjectStat {
    key: string;
    size: number;
    eTag?: string;
    lastModified?: Date;
}

/**
 * The narrow storage capability the upload core depends on.
 *
 * Listing calls return a single page; callers follow `nextCursor` /
 * `nextPartNumberMarker` until it is absent.
 */
export interface ObjectStore {
    createMultipartUpload(key: string, contentType?: string): Promise<string>;

    listMultipartUploads(prefix: string, cursor?: UploadListCursor): Promise<MultipartUploadPage>;

    listParts(key: string, uploadId: string, partNumberMarker?: number): Promise<PartPage>;

    uploadPart(key: string, uploadId: string, partNumber: number, body: Buffer): Promise<string>;

    completeMultipartUpload(key: string, uploadId: string, parts: CompletedPartRef[]): Promise<CompletedObject>;

    abortMultipartUpload(key: string, uploadId: string): Promise<void>;

    /** Resolves to null when no object exists at `key`. */
    statObject(key: string): Promise<ObjectStat | null>;
}
