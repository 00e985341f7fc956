import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryObjectStore, OBJECT_STORE, ObjectStoreError } from '@files';
import { ExpiryReaper } from './expiry-reaper.service';
import { InvalidArgumentError } from '../errors';

const HOUR_MS = 60 * 60 * 1000;

describe('ExpiryReaper', () => {
    let reaper: ExpiryReaper;
    let store: InMemoryObjectStore;
    let createdAt: Date;

    async function createSessionAged(key: string, ageHours: number): Promise<string> {
        createdAt = new Date(Date.now() - ageHours * HOUR_MS);
        return store.createMultipartUpload(key);
    }

    beforeEach(async () => {
        createdAt = new Date();
        store = new InMemoryObjectStore({ pageSize: 1, now: () => createdAt });

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                ExpiryReaper,
                {
                    provide: OBJECT_STORE,
                    useValue: store,
                },
            ],
        }).compile();

        reaper = module.get<ExpiryReaper>(ExpiryReaper);
    });

    it('should abort only sessions older than the cutoff', async () => {
        await createSessionAged('uploads/fc2e9254cb173470/old.bin', 25);
        const fresh = await createSessionAged('uploads/93481823938b933f/new.bin', 1);

        const count = await reaper.sweep(24);

        expect(count).toBe(1);
        const remaining = await store.listMultipartUploads('uploads/');
        expect(remaining.uploads.map((upload) => upload.uploadId)).toEqual([fresh]);
    });

    it('should leave sessions outside the uploads layout alone', async () => {
        await createSessionAged('uploads/stray', 48);

        await expect(reaper.sweep(24)).resolves.toBe(0);
        const remaining = await store.listMultipartUploads('uploads/');
        expect(remaining.uploads).toHaveLength(1);
    });

    it('should skip sessions whose abort fails and count the rest', async () => {
        await createSessionAged('uploads/fc2e9254cb173470/a.bin', 30);
        await createSessionAged('uploads/fc2e9254cb173470/b.bin', 30);
        jest.spyOn(store, 'abortMultipartUpload').mockRejectedValueOnce(new ObjectStoreError('unavailable', 'timeout'));

        await expect(reaper.sweep(24)).resolves.toBe(1);
    });

    it('should return 0 when nothing is pending', async () => {
        await expect(reaper.sweep(24)).resolves.toBe(0);
    });

    it('should reject a non-positive age', async () => {
        await expect(reaper.sweep(0)).rejects.toThrow(InvalidArgumentError);
        await expect(reaper.sweep(-1)).rejects.toThrow(InvalidArgumentError);
        await expect(reaper.sweep(Number.NaN)).rejects.toThrow(InvalidArgumentError);
    });
});
