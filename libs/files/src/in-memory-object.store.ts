import { Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import {
    CompletedObject,
    CompletedPartRef,
    MultipartUploadPage,
    MultipartUploadRecord,
    ObjectStat,
    ObjectStore,
    PartPage,
    UploadListCursor,
} from './object-store.port';
import { ObjectStoreError } from './object-store.error';

export interface InMemoryObjectStoreOptions {
    /** Entries per listing page (S3 uses 1000). */
    pageSize?: number;
    /** Smallest size accepted for every part but the last one at completion. */
    minPartSize?: number;
    now?: () => Date;
}

interface StoredPart {
    eTag: string;
    size: number;
    body: Buffer;
}

interface StoredSession {
    key: string;
    uploadId: string;
    initiatedAt: Date;
    contentType?: string;
    parts: Map<number, StoredPart>;
}

interface StoredObject {
    body: Buffer;
    eTag: string;
    lastModified: Date;
    contentType?: string;
}

const DEFAULT_PAGE_SIZE = 1000;
const DEFAULT_MIN_PART_SIZE = 5 * 1024 * 1024;

function compareStrings(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}

function md5(data: Buffer): Buffer {
    return createHash('md5').update(data).digest();
}

/**
 * Process-local ObjectStore that follows S3 multipart semantics closely
 * enough to run the coordinator without a real backend: part overwrite,
 * paged listings ordered by key then initiation time, minimum part size on
 * completion and session removal once completed or aborted.
 */
export class InMemoryObjectStore implements ObjectStore {
    private readonly logger = new Logger(InMemoryObjectStore.name);
    private readonly sessions = new Map<string, StoredSession>();
    private readonly objects = new Map<string, StoredObject>();
    private readonly pageSize: number;
    private readonly minPartSize: number;
    private readonly now: () => Date;

    constructor(options: InMemoryObjectStoreOptions = {}) {
        this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
        this.minPartSize = options.minPartSize ?? DEFAULT_MIN_PART_SIZE;
        this.now = options.now ?? (() => new Date());
    }

    private getSession(key: string, uploadId: string, action: string): StoredSession {
        const session = this.sessions.get(uploadId);
        if (!session || session.key !== key) {
            throw new ObjectStoreError('no_such_upload', `${action}: upload ${uploadId} does not exist for ${key}`);
        }
        return session;
    }

    async createMultipartUpload(key: string, contentType?: string): Promise<string> {
        const uploadId = uuidv4();
        this.sessions.set(uploadId, {
            key,
            uploadId,
            initiatedAt: this.now(),
            contentType,
            parts: new Map(),
        });
        this.logger.debug(`Initiated multipart upload for ${key} with UploadId: ${uploadId}`);
        return uploadId;
    }

    async listMultipartUploads(prefix: string, cursor?: UploadListCursor): Promise<MultipartUploadPage> {
        const matching = [...this.sessions.values()]
            .filter((session) => session.key.startsWith(prefix))
            .sort((a, b) =>
                compareStrings(a.key, b.key)
                || a.initiatedAt.getTime() - b.initiatedAt.getTime()
                || compareStrings(a.uploadId, b.uploadId));

        let start = 0;
        if (cursor) {
            const markerIndex = matching.findIndex(
                (session) => session.key === cursor.keyMarker && session.uploadId === cursor.uploadIdMarker,
            );
            start = markerIndex >= 0
                ? markerIndex + 1
                : matching.filter((session) => session.key <= cursor.keyMarker).length;
        }

        const page = matching.slice(start, start + this.pageSize);
        const uploads: MultipartUploadRecord[] = page.map((session) => ({
            key: session.key,
            uploadId: session.uploadId,
            initiatedAt: session.initiatedAt,
        }));

        const last = page[page.length - 1];
        const nextCursor = last && start + page.length < matching.length
            ? { keyMarker: last.key, uploadIdMarker: last.uploadId }
            : undefined;

        return { uploads, nextCursor };
    }

    async listParts(key: string, uploadId: string, partNumberMarker?: number): Promise<PartPage> {
        const session = this.getSession(key, uploadId, 'ListParts');
        const remaining = [...session.parts.entries()]
            .filter(([partNumber]) => partNumberMarker === undefined || partNumber > partNumberMarker)
            .sort(([a], [b]) => a - b);

        const page = remaining.slice(0, this.pageSize);
        const last = page[page.length - 1];

        return {
            parts: page.map(([partNumber, part]) => ({ partNumber, eTag: part.eTag, size: part.size })),
            nextPartNumberMarker: last && remaining.length > page.length ? last[0] : undefined,
        };
    }

    async uploadPart(key: string, uploadId: string, partNumber: number, body: Buffer): Promise<string> {
        const session = this.getSession(key, uploadId, 'UploadPart');
        const eTag = `"${md5(body).toString('hex')}"`;
        session.parts.set(partNumber, { eTag, size: body.length, body });
        return eTag;
    }

    async completeMultipartUpload(key: string, uploadId: string, parts: CompletedPartRef[]): Promise<CompletedObject> {
        const session = this.getSession(key, uploadId, 'CompleteMultipartUpload');
        if (parts.length === 0) {
            throw new ObjectStoreError('invalid_part', 'CompleteMultipartUpload: no parts were specified');
        }

        const bodies: Buffer[] = [];
        const digests: Buffer[] = [];
        parts.forEach((ref, index) => {
            if (index > 0 && ref.partNumber <= parts[index - 1].partNumber) {
                throw new ObjectStoreError('invalid_part', 'CompleteMultipartUpload: parts are not in ascending order');
            }
            const stored = session.parts.get(ref.partNumber);
            if (!stored || stored.eTag !== ref.eTag) {
                throw new ObjectStoreError('invalid_part', `CompleteMultipartUpload: part ${ref.partNumber} not found or ETag mismatch`);
            }
            if (index < parts.length - 1 && stored.size < this.minPartSize) {
                throw new ObjectStoreError('entity_too_small', `CompleteMultipartUpload: part ${ref.partNumber} is smaller than the minimum part size`);
            }
            bodies.push(stored.body);
            digests.push(md5(stored.body));
        });

        const eTag = `"${md5(Buffer.concat(digests)).toString('hex')}-${parts.length}"`;
        this.objects.set(key, {
            body: Buffer.concat(bodies),
            eTag,
            lastModified: this.now(),
            contentType: session.contentType,
        });
        this.sessions.delete(uploadId);

        return { key, eTag };
    }

    async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
        this.getSession(key, uploadId, 'AbortMultipartUpload');
        this.sessions.delete(uploadId);
    }

    async statObject(key: string): Promise<ObjectStat | null> {
        const object = this.objects.get(key);
        if (!object) {
            return null;
        }
        return { key, size: object.body.length, eTag: object.eTag, lastModified: object.lastModified };
    }

    /** Raw body of a completed object, or null. */
    readObject(key: string): Buffer | null {
        return this.objects.get(key)?.body ?? null;
    }
}
