import { InMemoryObjectStore } from './in-memory-object.store';
import { ObjectStoreError } from './object-store.error';

describe('InMemoryObjectStore', () => {
    let store: InMemoryObjectStore;
    let tick: number;

    beforeEach(() => {
        tick = 0;
        store = new InMemoryObjectStore({
            pageSize: 2,
            minPartSize: 4,
            now: () => new Date(Date.UTC(2026, 0, 1) + (tick++) * 1000),
        });
    });

    it('should page uploads in key then initiation order', async () => {
        const c = await store.createMultipartUpload('uploads/c');
        const a1 = await store.createMultipartUpload('uploads/a');
        const b = await store.createMultipartUpload('uploads/b');
        const a2 = await store.createMultipartUpload('uploads/a');
        await store.createMultipartUpload('other/a');

        const first = await store.listMultipartUploads('uploads/');
        expect(first.uploads.map((upload) => upload.uploadId)).toEqual([a1, a2]);
        expect(first.nextCursor).toEqual({ keyMarker: 'uploads/a', uploadIdMarker: a2 });

        const second = await store.listMultipartUploads('uploads/', first.nextCursor);
        expect(second.uploads.map((upload) => upload.uploadId)).toEqual([b, c]);
        expect(second.nextCursor).toBeUndefined();
    });

    it('should page parts by part number marker', async () => {
        const uploadId = await store.createMultipartUpload('k');
        for (const partNumber of [3, 1, 2]) {
            await store.uploadPart('k', uploadId, partNumber, Buffer.from('abcd'));
        }

        const first = await store.listParts('k', uploadId);
        expect(first.parts.map((part) => part.partNumber)).toEqual([1, 2]);
        expect(first.nextPartNumberMarker).toBe(2);

        const second = await store.listParts('k', uploadId, first.nextPartNumberMarker);
        expect(second.parts.map((part) => part.partNumber)).toEqual([3]);
        expect(second.nextPartNumberMarker).toBeUndefined();
    });

    it('should concatenate parts on completion and drop the session', async () => {
        const uploadId = await store.createMultipartUpload('k');
        const eTag1 = await store.uploadPart('k', uploadId, 1, Buffer.from('abcd'));
        const eTag2 = await store.uploadPart('k', uploadId, 2, Buffer.from('ef'));

        const completed = await store.completeMultipartUpload('k', uploadId, [
            { partNumber: 1, eTag: eTag1 },
            { partNumber: 2, eTag: eTag2 },
        ]);

        expect(completed.key).toBe('k');
        expect(completed.eTag).toMatch(/^"[0-9a-f]{32}-2"$/);
        expect(store.readObject('k')?.toString()).toBe('abcdef');
        await expect(store.statObject('k')).resolves.toMatchObject({ key: 'k', size: 6 });
        await expect(store.listParts('k', uploadId)).rejects.toMatchObject({ kind: 'no_such_upload' });
    });

    it('should reject a part smaller than the minimum unless it is the last', async () => {
        const uploadId = await store.createMultipartUpload('k');
        const eTag1 = await store.uploadPart('k', uploadId, 1, Buffer.from('ab'));
        const eTag2 = await store.uploadPart('k', uploadId, 2, Buffer.from('cd'));

        await expect(store.completeMultipartUpload('k', uploadId, [
            { partNumber: 1, eTag: eTag1 },
            { partNumber: 2, eTag: eTag2 },
        ])).rejects.toMatchObject({ kind: 'entity_too_small' });
    });

    it('should reject an unknown ETag or unordered manifest', async () => {
        const uploadId = await store.createMultipartUpload('k');
        const eTag1 = await store.uploadPart('k', uploadId, 1, Buffer.from('abcd'));
        const eTag2 = await store.uploadPart('k', uploadId, 2, Buffer.from('efgh'));

        await expect(store.completeMultipartUpload('k', uploadId, [{ partNumber: 1, eTag: '"nope"' }]))
            .rejects.toMatchObject({ kind: 'invalid_part' });
        await expect(store.completeMultipartUpload('k', uploadId, [
            { partNumber: 2, eTag: eTag2 },
            { partNumber: 1, eTag: eTag1 },
        ])).rejects.toMatchObject({ kind: 'invalid_part' });
        await expect(store.completeMultipartUpload('k', uploadId, [])).rejects.toMatchObject({ kind: 'invalid_part' });
    });

    it('should raise no_such_upload for unknown or aborted sessions', async () => {
        const uploadId = await store.createMultipartUpload('k');
        await store.abortMultipartUpload('k', uploadId);

        await expect(store.abortMultipartUpload('k', uploadId)).rejects.toBeInstanceOf(ObjectStoreError);
        await expect(store.uploadPart('k', uploadId, 1, Buffer.from('a'))).rejects.toMatchObject({ kind: 'no_such_upload' });
        await expect(store.listParts('other', uploadId)).rejects.toMatchObject({ kind: 'no_such_upload' });
        await expect(store.statObject('k')).resolves.toBeNull();
    });
});
