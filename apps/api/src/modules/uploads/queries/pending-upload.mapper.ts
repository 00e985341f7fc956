import { PendingUploadSummary } from '@uploads';
import { PendingUploadDto } from '../dto/upload-response.dto';

export function toPendingUploadDto(summary: PendingUploadSummary): PendingUploadDto {
    return {
        uploadId: summary.uploadId,
        key: summary.key,
        signature: summary.signature,
        fileName: summary.fileName,
        chunkSize: summary.chunkSize,
        completedChunks: summary.completedChunks,
        bytesUploaded: summary.bytesUploaded,
        createdAt: summary.createdAt ? summary.createdAt.toISOString() : null,
    };
}
