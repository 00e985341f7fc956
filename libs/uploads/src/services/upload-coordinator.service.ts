import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MultipartUploadRecord, OBJECT_STORE, ObjectStore, ObjectStoreError, PartRecord } from '@files';
import {
    DEFAULT_CHUNK_SIZE,
    MAX_OBJECT_SIZE,
    MAX_PART_COUNT,
    MAX_PART_SIZE,
    UPLOADS_PREFIX,
} from '../constants';
import {
    AbortFailedError,
    CapacityExceededError,
    CompletionFailedError,
    ExpiredSessionError,
    InvalidArgumentError,
    MalformedKeyError,
    PartUploadFailedError,
    SessionNotFoundError,
} from '../errors';
import { DecodedObjectKey, decodeObjectKey, encodeObjectKey, signaturePrefix } from '../key-codec';
import { FileSignature, isFileSignature } from '../signature';
import { collectParts, collectUploads } from '../pagination';
import {
    CompletionResult,
    InitUploadResult,
    PendingUploadSummary,
    UploadedPart,
} from '../interfaces/upload-session.interface';

/**
 * Multipart session orchestration with the object store as the only source
 * of truth. Nothing about a session is kept between calls: every operation
 * re-derives what it needs from the backend's list responses.
 */
@Injectable()
export class UploadCoordinator {
    private readonly logger = new Logger(UploadCoordinator.name);
    private readonly defaultChunkSize: number;

    constructor(
        @Inject(OBJECT_STORE) private readonly objectStore: ObjectStore,
        private readonly configService: ConfigService,
    ) {
        this.defaultChunkSize = this.configService.get<number>('uploads.defaultChunkSize', DEFAULT_CHUNK_SIZE);
        if (!Number.isSafeInteger(this.defaultChunkSize) || this.defaultChunkSize <= 0 || this.defaultChunkSize > MAX_PART_SIZE) {
            throw new Error(`uploads.defaultChunkSize must be an integer between 1 and ${MAX_PART_SIZE}, got ${this.defaultChunkSize}`);
        }
    }

    /**
     * Adopts the in-progress session for `signature` if the backend still has
     * one, otherwise opens a new session at the signature's key.
     */
    async initOrResume(signature: FileSignature, fileName: string, fileSize: number): Promise<InitUploadResult> {
        if (!isFileSignature(signature)) {
            throw new InvalidArgumentError(`Signature must be 16 lowercase hex characters, got "${signature}"`);
        }
        if (!Number.isSafeInteger(fileSize) || fileSize <= 0) {
            throw new InvalidArgumentError(`File size must be a positive integer, got ${fileSize}`);
        }
        this.assertCapacity(fileSize, this.defaultChunkSize);

        const key = encodeObjectKey(signature, fileName);
        const candidates = await collectUploads(this.objectStore, signaturePrefix(signature));

        for (const candidate of this.orderResumeCandidates(candidates, key)) {
            const resumed = await this.resume(candidate, fileSize);
            if (resumed) {
                return resumed;
            }
        }

        const uploadId = await this.objectStore.createMultipartUpload(key);
        const totalChunks = Math.ceil(fileSize / this.defaultChunkSize);
        this.logger.log(`Created new upload: signature=${signature}, uploadId=${uploadId}, totalChunks=${totalChunks}`);

        return {
            uploadId,
            key,
            chunkSize: this.defaultChunkSize,
            totalChunks,
            completedChunks: 0,
            uploadedParts: [],
            isResume: false,
        };
    }

    async uploadPart(uploadId: string, key: string, partNumber: number, bytes: Buffer): Promise<UploadedPart> {
        decodeObjectKey(key);
        this.assertUploadId(uploadId);
        if (!Number.isInteger(partNumber) || partNumber < 1) {
            throw new InvalidArgumentError(`Part number must be an integer of at least 1, got ${partNumber}`);
        }
        if (partNumber > MAX_PART_COUNT) {
            throw new CapacityExceededError(`Part number ${partNumber} is above the ${MAX_PART_COUNT} part limit`);
        }
        if (bytes.length > MAX_PART_SIZE) {
            throw new CapacityExceededError(`Chunk of ${bytes.length} bytes is above the ${MAX_PART_SIZE} byte part limit`);
        }

        try {
            const eTag = await this.objectStore.uploadPart(key, uploadId, partNumber, bytes);
            return { partNumber, eTag, size: bytes.length };
        } catch (err) {
            if (ObjectStoreError.is(err, 'no_such_upload')) {
                throw new ExpiredSessionError(`Upload ${uploadId} no longer exists; start a new session`, { cause: err });
            }
            this.logger.warn(`Part ${partNumber} of ${uploadId} failed: ${err instanceof Error ? err.message : String(err)}`);
            throw new PartUploadFailedError(`Uploading part ${partNumber} failed; retry the same chunk`, { cause: err });
        }
    }

    /**
     * Finalizes the session from the parts the backend reports. A session that
     * is gone while an object sits at its key was completed by an earlier call.
     */
    async complete(uploadId: string, key: string): Promise<CompletionResult> {
        const decoded = decodeObjectKey(key);
        this.assertUploadId(uploadId);

        let parts: PartRecord[];
        try {
            parts = await collectParts(this.objectStore, key, uploadId);
        } catch (err) {
            if (ObjectStoreError.is(err, 'no_such_upload')) {
                return this.resolveFinishedSession(uploadId, key, decoded, err);
            }
            throw err;
        }

        if (parts.length === 0) {
            throw new CompletionFailedError(`Upload ${uploadId} has no parts to complete`);
        }
        const gapIndex = parts.findIndex((part, index) => part.partNumber !== index + 1);
        if (gapIndex >= 0) {
            throw new CompletionFailedError(`Upload ${uploadId} is missing part ${gapIndex + 1}`);
        }

        const manifest = parts.map((part) => ({ partNumber: part.partNumber, eTag: part.eTag }));
        try {
            const completed = await this.objectStore.completeMultipartUpload(key, uploadId, manifest);
            this.logger.log(`Completed upload ${uploadId} into ${completed.key} (${parts.length} parts)`);
            return {
                status: 'completed',
                key: completed.key,
                signature: decoded.signature,
                fileName: decoded.fileName,
                partCount: parts.length,
                location: completed.location,
                eTag: completed.eTag,
            };
        } catch (err) {
            if (ObjectStoreError.is(err, 'no_such_upload')) {
                return this.resolveFinishedSession(uploadId, key, decoded, err);
            }
            const message = err instanceof Error ? err.message : String(err);
            throw new CompletionFailedError(`Backend rejected completion of ${uploadId}: ${message}`, { cause: err });
        }
    }

    /**
     * Aborting a session the backend no longer has is a no-op.
     */
    async abort(uploadId: string, key: string): Promise<void> {
        decodeObjectKey(key);
        this.assertUploadId(uploadId);

        try {
            await this.objectStore.abortMultipartUpload(key, uploadId);
            this.logger.log(`Aborted upload: uploadId=${uploadId}`);
        } catch (err) {
            if (ObjectStoreError.is(err, 'no_such_upload')) {
                this.logger.debug(`Upload ${uploadId} was already gone when aborted`);
                return;
            }
            throw new AbortFailedError(`Aborting upload ${uploadId} failed`, { cause: err });
        }
    }

    /**
     * Every in-progress session under the uploads prefix, most recent first.
     */
    async listPending(): Promise<PendingUploadSummary[]> {
        const uploads = await collectUploads(this.objectStore, UPLOADS_PREFIX);
        const pending: PendingUploadSummary[] = [];

        for (const upload of uploads) {
            let decoded: DecodedObjectKey;
            try {
                decoded = decodeObjectKey(upload.key);
            } catch (err) {
                if (err instanceof MalformedKeyError) {
                    this.logger.debug(`Skipping foreign multipart upload ${upload.key}`);
                    continue;
                }
                throw err;
            }

            const summary = await this.summarize(upload, decoded);
            if (summary) {
                pending.push(summary);
            }
        }

        return pending.sort((a, b) => (b.createdAt?.getTime() ?? 0) - (a.createdAt?.getTime() ?? 0));
    }

    async status(uploadId: string): Promise<PendingUploadSummary> {
        this.assertUploadId(uploadId);

        const uploads = await collectUploads(this.objectStore, UPLOADS_PREFIX);
        const upload = uploads.find((candidate) => candidate.uploadId === uploadId);
        if (!upload) {
            throw new SessionNotFoundError(`Upload ${uploadId} does not exist`);
        }

        const summary = await this.summarize(upload, decodeObjectKey(upload.key));
        if (!summary) {
            throw new SessionNotFoundError(`Upload ${uploadId} does not exist`);
        }
        return summary;
    }

    private assertUploadId(uploadId: string): void {
        if (uploadId.trim().length === 0) {
            throw new InvalidArgumentError('Upload id must not be empty');
        }
    }

    private assertCapacity(fileSize: number, chunkSize: number): void {
        if (fileSize > MAX_OBJECT_SIZE) {
            throw new CapacityExceededError(`File of ${fileSize} bytes is above the ${MAX_OBJECT_SIZE} byte object limit`);
        }
        if (!this.fitsPartLimit(fileSize, chunkSize)) {
            throw new CapacityExceededError(
                `File of ${fileSize} bytes needs more than ${MAX_PART_COUNT} parts of ${chunkSize} bytes`,
            );
        }
    }

    private fitsPartLimit(fileSize: number, chunkSize: number): boolean {
        return chunkSize * MAX_PART_COUNT >= fileSize;
    }

    /**
     * Sessions at exactly `key` first, then anything else under the signature
     * prefix; oldest first within each group so racing callers pick the same one.
     */
    private orderResumeCandidates(candidates: MultipartUploadRecord[], key: string): MultipartUploadRecord[] {
        const initiated = (upload: MultipartUploadRecord) => upload.initiatedAt?.getTime() ?? Number.MAX_SAFE_INTEGER;
        return [...candidates].sort((a, b) =>
            Number(b.key === key) - Number(a.key === key) || initiated(a) - initiated(b));
    }

    private async resume(upload: MultipartUploadRecord, fileSize: number): Promise<InitUploadResult | null> {
        let parts: PartRecord[];
        try {
            parts = await collectParts(this.objectStore, upload.key, upload.uploadId);
        } catch (err) {
            if (ObjectStoreError.is(err, 'no_such_upload')) {
                this.logger.debug(`Upload ${upload.uploadId} vanished before it could be resumed`);
                return null;
            }
            throw err;
        }

        const chunkSize = this.resumedChunkSize(parts, fileSize);
        if (chunkSize === null || !this.fitsPartLimit(fileSize, chunkSize)) {
            this.logger.warn(`Upload ${upload.uploadId} does not match a ${fileSize} byte file split into chunks, not resuming it`);
            return null;
        }
        const totalChunks = Math.ceil(fileSize / chunkSize);

        this.logger.log(`Resuming upload: uploadId=${upload.uploadId}, completed=${parts.length}/${totalChunks}`);

        return {
            uploadId: upload.uploadId,
            key: upload.key,
            chunkSize,
            totalChunks,
            completedChunks: parts.length,
            uploadedParts: parts.map((part) => part.partNumber),
            isResume: true,
        };
    }

    private async summarize(upload: MultipartUploadRecord, decoded: DecodedObjectKey): Promise<PendingUploadSummary | null> {
        let parts: PartRecord[];
        try {
            parts = await collectParts(this.objectStore, upload.key, upload.uploadId);
        } catch (err) {
            if (ObjectStoreError.is(err, 'no_such_upload')) {
                return null;
            }
            throw err;
        }

        return {
            uploadId: upload.uploadId,
            key: upload.key,
            signature: decoded.signature,
            fileName: decoded.fileName,
            chunkSize: this.fullChunkSize(parts) ?? this.defaultChunkSize,
            completedChunks: parts.length,
            bytesUploaded: parts.reduce((sum, part) => sum + part.size, 0),
            createdAt: upload.initiatedAt ?? null,
        };
    }

    /**
     * Every part below the highest stored one is a full chunk, and so is
     * part 1. A lone higher part may be the short tail of the file.
     */
    private fullChunkSize(parts: PartRecord[]): number | null {
        const [first, second] = parts;
        if (!first || first.size === 0) {
            return null;
        }
        return first.partNumber === 1 || second ? first.size : null;
    }

    /**
     * Chunk size the session was started with, or `null` when the stored
     * parts cannot have come from splitting `fileSize` into equal chunks.
     */
    private resumedChunkSize(parts: PartRecord[], fileSize: number): number | null {
        const [first] = parts;
        if (!first) {
            return this.defaultChunkSize;
        }

        const known = this.fullChunkSize(parts);
        if (known !== null) {
            return known;
        }

        // lone tail part: accept it only if it is where the default chunk size puts the end of the file
        const lastPartNumber = Math.ceil(fileSize / this.defaultChunkSize);
        const tailSize = fileSize - (lastPartNumber - 1) * this.defaultChunkSize;
        return first.partNumber === lastPartNumber && first.size === tailSize ? this.defaultChunkSize : null;
    }

    /**
     * The backend keeps no record of finished sessions, so any object at `key`
     * counts as this session's result. That includes an object left by an
     * earlier upload of the same file when this session was aborted instead.
     */
    private async resolveFinishedSession(
        uploadId: string,
        key: string,
        decoded: DecodedObjectKey,
        cause: ObjectStoreError,
    ): Promise<CompletionResult> {
        const existing = await this.objectStore.statObject(key);
        if (!existing) {
            throw new SessionNotFoundError(`Upload ${uploadId} does not exist for ${key}; start a new session`, { cause });
        }

        this.logger.log(`Upload ${uploadId} is already finished; object present at ${key}`);
        return {
            status: 'already_completed',
            key,
            signature: decoded.signature,
            fileName: decoded.fileName,
        };
    }
}
