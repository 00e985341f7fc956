import { Inject, Injectable, Logger } from '@nestjs/common';
import { OBJECT_STORE, ObjectStore } from '@files';
import { UPLOADS_PREFIX } from '../constants';
import { InvalidArgumentError, MalformedKeyError } from '../errors';
import { decodeObjectKey } from '../key-codec';
import { collectUploads } from '../pagination';

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class ExpiryReaper {
    private readonly logger = new Logger(ExpiryReaper.name);

    constructor(@Inject(OBJECT_STORE) private readonly objectStore: ObjectStore) { }

    /**
     * Aborts every upload session initiated more than `maxAgeHours` ago.
     * A failed abort is logged and skipped.
     * @returns Number of sessions actually aborted.
     */
    async sweep(maxAgeHours: number): Promise<number> {
        if (!Number.isFinite(maxAgeHours) || maxAgeHours <= 0) {
            throw new InvalidArgumentError(`maxAgeHours must be a positive number, got ${maxAgeHours}`);
        }

        const cutoff = Date.now() - maxAgeHours * HOUR_MS;
        const uploads = await collectUploads(this.objectStore, UPLOADS_PREFIX);
        let count = 0;

        for (const upload of uploads) {
            try {
                decodeObjectKey(upload.key);
            } catch (err) {
                if (err instanceof MalformedKeyError) {
                    continue;
                }
                throw err;
            }

            if (!upload.initiatedAt || upload.initiatedAt.getTime() >= cutoff) {
                continue;
            }

            try {
                await this.objectStore.abortMultipartUpload(upload.key, upload.uploadId);
                count++;
                this.logger.debug(`Aborted expired upload ${upload.uploadId} (${upload.key})`);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                this.logger.warn(`Failed to abort expired upload ${upload.uploadId}: ${message}`);
            }
        }

        if (count > 0) {
            this.logger.log(`Cleaned up ${count} expired uploads`);
        }
        return count;
    }
}
