import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
    S3Client,
    CreateMultipartUploadCommand,
    ListMultipartUploadsCommand,
    ListPartsCommand,
    UploadPartCommand,
    CompleteMultipartUploadCommand,
    AbortMultipartUploadCommand,
    HeadObjectCommand,
    S3ServiceException,
} from '@aws-sdk/client-s3';
import {
    CompletedObject,
    CompletedPartRef,
    MultipartUploadPage,
    MultipartUploadRecord,
    ObjectStat,
    ObjectStore,
    PartPage,
    PartRecord,
    UploadListCursor,
} from './object-store.port';
import { ObjectStoreError, ObjectStoreErrorKind } from './object-store.error';

const DEFAULT_MAX_ATTEMPTS = 3;

const UNAVAILABLE_ERRORS = [
    'RequestTimeout',
    'RequestTimeoutException',
    'PriorRequestNotComplete',
    'ThrottlingException',
    'TooManyRequestsException',
    'InternalError',
    'ServiceUnavailable',
    'SlowDown',
];

/**
 * ObjectStore backed by an S3-compatible service (AWS S3, MinIO, R2...).
 *
 * Transient failures are retried by the SDK itself (`maxAttempts`); everything
 * that still fails is translated into an {@link ObjectStoreError}.
 */
@Injectable()
export class S3ObjectStore implements ObjectStore {
    private readonly logger = new Logger(S3ObjectStore.name);
    private readonly s3Client: S3Client;
    private readonly bucketName: string;

    constructor(private readonly configService: ConfigService) {
        this.s3Client = new S3Client({
            region: this.configService.get<string>('s3.region'),
            endpoint: this.configService.get<string>('s3.endpoint'),
            credentials: {
                accessKeyId: this.configService.getOrThrow<string>('s3.accessKeyId'),
                secretAccessKey: this.configService.getOrThrow<string>('s3.secretAccessKey'),
            },
            forcePathStyle: true,
            maxAttempts: this.configService.get<number>('s3.maxAttempts', DEFAULT_MAX_ATTEMPTS),
        });
        this.bucketName = this.configService.getOrThrow<string>('s3.bucketName');
    }

    /**
     * Maps an SDK failure onto the backend-neutral error kinds.
     */
    private toObjectStoreError(err: unknown, action: string): ObjectStoreError {
        if (!(err instanceof S3ServiceException)) {
            const message = err instanceof Error ? err.message : String(err);
            return new ObjectStoreError('unavailable', `${action}: ${message}`, { cause: err });
        }

        let kind: ObjectStoreErrorKind = 'unknown';
        switch (err.name) {
            case 'NoSuchUpload':
                kind = 'no_such_upload';
                break;
            case 'InvalidPart':
            case 'InvalidPartOrder':
                kind = 'invalid_part';
                break;
            case 'EntityTooSmall':
                kind = 'entity_too_small';
                break;
            case 'NotFound':
            case 'NoSuchKey':
                kind = 'not_found';
                break;
            default:
                if (UNAVAILABLE_ERRORS.includes(err.name) || (err.$metadata?.httpStatusCode ?? 0) >= 500) {
                    kind = 'unavailable';
                }
        }

        return new ObjectStoreError(kind, `${action}: ${err.name}: ${err.message}`, { cause: err });
    }

    async createMultipartUpload(key: string, contentType?: string): Promise<string> {
        const command = new CreateMultipartUploadCommand({
            Bucket: this.bucketName,
            Key: key,
            ContentType: contentType,
        });

        let uploadId: string | undefined;
        try {
            const response = await this.s3Client.send(command);
            uploadId = response.UploadId;
        } catch (err) {
            this.logger.error(`Failed to initiate multipart upload for ${key}`, err);
            throw this.toObjectStoreError(err, 'CreateMultipartUpload');
        }

        if (!uploadId) {
            throw new ObjectStoreError('unknown', 'CreateMultipartUpload: S3 did not return an UploadId');
        }
        this.logger.debug(`Initiated multipart upload for ${key} with UploadId: ${uploadId}`);
        return uploadId;
    }

    async listMultipartUploads(prefix: string, cursor?: UploadListCursor): Promise<MultipartUploadPage> {
        const command = new ListMultipartUploadsCommand({
            Bucket: this.bucketName,
            Prefix: prefix,
            KeyMarker: cursor?.keyMarker,
            UploadIdMarker: cursor?.uploadIdMarker,
        });

        try {
            const response = await this.s3Client.send(command);
            const uploads: MultipartUploadRecord[] = [];
            for (const upload of response.Uploads ?? []) {
                if (!upload.Key || !upload.UploadId) {
                    continue;
                }
                uploads.push({ key: upload.Key, uploadId: upload.UploadId, initiatedAt: upload.Initiated });
            }

            const nextCursor = response.IsTruncated && response.NextKeyMarker
                ? { keyMarker: response.NextKeyMarker, uploadIdMarker: response.NextUploadIdMarker }
                : undefined;

            return { uploads, nextCursor };
        } catch (err) {
            this.logger.error(`Failed to list multipart uploads under ${prefix}`, err);
            throw this.toObjectStoreError(err, 'ListMultipartUploads');
        }
    }

    async listParts(key: string, uploadId: string, partNumberMarker?: number): Promise<PartPage> {
        const command = new ListPartsCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
            PartNumberMarker: partNumberMarker === undefined ? undefined : String(partNumberMarker),
        });

        try {
            const response = await this.s3Client.send(command);
            const parts: PartRecord[] = [];
            for (const part of response.Parts ?? []) {
                if (part.PartNumber === undefined || !part.ETag) {
                    continue;
                }
                parts.push({ partNumber: part.PartNumber, eTag: part.ETag, size: part.Size ?? 0 });
            }

            const next = Number(response.NextPartNumberMarker);
            const nextPartNumberMarker = response.IsTruncated && Number.isInteger(next) ? next : undefined;

            return { parts, nextPartNumberMarker };
        } catch (err) {
            throw this.toObjectStoreError(err, 'ListParts');
        }
    }

    async uploadPart(key: string, uploadId: string, partNumber: number, body: Buffer): Promise<string> {
        const command = new UploadPartCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
            PartNumber: partNumber,
            Body: body,
            ContentLength: body.length,
        });

        let eTag: string | undefined;
        try {
            const response = await this.s3Client.send(command);
            eTag = response.ETag;
        } catch (err) {
            this.logger.error(`Failed to upload part ${partNumber} for ${key} (UploadId: ${uploadId})`, err);
            throw this.toObjectStoreError(err, 'UploadPart');
        }

        if (!eTag) {
            throw new ObjectStoreError('unknown', 'UploadPart: S3 did not return an ETag for the uploaded part');
        }
        this.logger.debug(`Uploaded part ${partNumber} for ${key} (UploadId: ${uploadId})`);
        return eTag;
    }

    async completeMultipartUpload(key: string, uploadId: string, parts: CompletedPartRef[]): Promise<CompletedObject> {
        const command = new CompleteMultipartUploadCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
            MultipartUpload: {
                Parts: parts.map((part) => ({ PartNumber: part.partNumber, ETag: part.eTag })),
            },
        });

        try {
            const response = await this.s3Client.send(command);
            this.logger.debug(`Completed multipart upload for ${key} (UploadId: ${uploadId})`);
            return { key: response.Key ?? key, location: response.Location, eTag: response.ETag };
        } catch (err) {
            this.logger.error(`Failed to complete multipart upload for ${key} (UploadId: ${uploadId})`, err);
            throw this.toObjectStoreError(err, 'CompleteMultipartUpload');
        }
    }

    async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
        const command = new AbortMultipartUploadCommand({
            Bucket: this.bucketName,
            Key: key,
            UploadId: uploadId,
        });

        try {
            await this.s3Client.send(command);
            this.logger.debug(`Aborted multipart upload for ${key} (UploadId: ${uploadId})`);
        } catch (err) {
            throw this.toObjectStoreError(err, 'AbortMultipartUpload');
        }
    }

    async statObject(key: string): Promise<ObjectStat | null> {
        const command = new HeadObjectCommand({
            Bucket: this.bucketName,
            Key: key,
        });

        try {
            const response = await this.s3Client.send(command);
            return {
                key,
                size: response.ContentLength ?? 0,
                eTag: response.ETag,
                lastModified: response.LastModified,
            };
        } catch (err) {
            const storeError = this.toObjectStoreError(err, 'HeadObject');
            if (storeError.kind === 'not_found') {
                return null;
            }
            this.logger.error(`Failed to check object existence ${key}`, err);
            throw storeError;
        }
    }
}
