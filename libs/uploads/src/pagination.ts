import { MultipartUploadRecord, ObjectStore, PartRecord, UploadListCursor } from '@files';

/**
 * Follows every page of a multipart-upload listing.
 */
export async function collectUploads(objectStore: ObjectStore, prefix: string): Promise<MultipartUploadRecord[]> {
    const uploads: MultipartUploadRecord[] = [];
    let cursor: UploadListCursor | undefined;

    do {
        const page = await objectStore.listMultipartUploads(prefix, cursor);
        uploads.push(...page.uploads);
        cursor = page.nextCursor;
    } while (cursor);

    return uploads;
}

/**
 * Follows every page of a part listing; the result is ordered by part number.
 */
export async function collectParts(objectStore: ObjectStore, key: string, uploadId: string): Promise<PartRecord[]> {
    const parts: PartRecord[] = [];
    let marker: number | undefined;

    do {
        const page = await objectStore.listParts(key, uploadId, marker);
        parts.push(...page.parts);
        marker = page.nextPartNumberMarker;
    } while (marker !== undefined);

    return parts.sort((a, b) => a.partNumber - b.partNumber);
}
