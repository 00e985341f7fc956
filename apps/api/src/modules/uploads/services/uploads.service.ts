import { Injectable, Logger } from '@nestjs/common';
import { EventBus } from '@nestjs/cqrs';
import {
    CompletionResult,
    ExpiryReaper,
    FileSignature,
    InitUploadResult,
    UploadCoordinator,
    UploadedPart,
} from '@uploads';
import { UploadCompletedEvent } from '@events';

/**
 * Request-facing upload operations. Everything session-related is delegated
 * to the coordinator; this layer only adds the completion hand-off.
 */
@Injectable()
export class UploadsService {
    private readonly logger = new Logger(UploadsService.name);

    constructor(
        private readonly uploadCoordinator: UploadCoordinator,
        private readonly expiryReaper: ExpiryReaper,
        private readonly eventBus: EventBus,
    ) { }

    init(signature: FileSignature, fileName: string, fileSize: number): Promise<InitUploadResult> {
        return this.uploadCoordinator.initOrResume(signature, fileName, fileSize);
    }

    uploadChunk(uploadId: string, key: string, partNumber: number, chunk: Buffer): Promise<UploadedPart> {
        return this.uploadCoordinator.uploadPart(uploadId, key, partNumber, chunk);
    }

    /**
     * Completes the upload and, for the call that actually finalized it,
     * publishes {@link UploadCompletedEvent}.
     */
    async complete(uploadId: string, key: string): Promise<CompletionResult> {
        const result = await this.uploadCoordinator.complete(uploadId, key);

        if (result.status === 'completed') {
            this.eventBus.publish(new UploadCompletedEvent({
                key: result.key,
                signature: result.signature,
                fileName: result.fileName,
                location: result.location,
            }));
        } else {
            this.logger.debug(`Upload ${uploadId} was already completed, no event published`);
        }

        return result;
    }

    abort(uploadId: string, key: string): Promise<void> {
        return this.uploadCoordinator.abort(uploadId, key);
    }

    cleanupExpired(maxAgeHours: number): Promise<number> {
        return this.expiryReaper.sweep(maxAgeHours);
    }
}
