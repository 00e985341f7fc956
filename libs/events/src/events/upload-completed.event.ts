import { BaseEvent } from './base-event';

export interface UploadCompletedEventPayload {
    key: string;
    signature: string;
    fileName: string;
    location?: string;
}

/**
 * Raised once a multipart upload has been finalized into its object; the
 * cataloging step picks the file up from here.
 */
export class UploadCompletedEvent extends BaseEvent<UploadCompletedEventPayload> {
    public readonly eventName = 'upload.completed.event';
}
