import { FileSignature } from '../signature';

export interface InitUploadResult {
    uploadId: string;
    key: string;
    chunkSize: number;
    totalChunks: number;
    completedChunks: number;
    /** Part numbers already stored, ascending. */
    uploadedParts: number[];
    isResume: boolean;
}

export interface UploadedPart {
    partNumber: number;
    eTag: string;
    size: number;
}

/**
 * Read-only view of an in-progress session, derived from the backend's
 * list-uploads and list-parts responses.
 */
export interface PendingUploadSummary {
    uploadId: string;
    key: string;
    signature: FileSignature;
    fileName: string;
    chunkSize: number;
    completedChunks: number;
    bytesUploaded: number;
    createdAt: Date | null;
}

export interface UploadCompleted {
    status: 'completed';
    key: string;
    signature: FileSignature;
    fileName: string;
    partCount: number;
    location?: string;
    eTag?: string;
}

/** Another call already finalized this session; the object exists at `key`. */
export interface UploadAlreadyCompleted {
    status: 'already_completed';
    key: string;
    signature: FileSignature;
    fileName: string;
}

export type CompletionResult = UploadCompleted | UploadAlreadyCompleted;
