import { Test, TestingModule } from '@nestjs/testing';
import { QueryBus } from '@nestjs/cqrs';
import { ConfigService } from '@nestjs/config';
import { UploadsController } from './uploads.controller';
import { UploadsService } from '../services/uploads.service';
import { ApiKeyGuard } from '../../../common/guards/api-key.guard';
import { GetPendingUploadsQuery } from '../queries/get-pending-uploads.query';
import { GetUploadStatusQuery } from '../queries/get-upload-status.query';

describe('UploadsController', () => {
    let controller: UploadsController;

    const mockUploadsService = {
        init: jest.fn(),
        uploadChunk: jest.fn(),
        complete: jest.fn(),
        abort: jest.fn(),
        cleanupExpired: jest.fn(),
    };

    const mockQueryBus = {
        execute: jest.fn(),
    };

    const uploadId = 'upload-1';
    const key = 'uploads/fc2e9254cb173470/a.txt';

    beforeEach(async () => {
        const module: TestingModule = await Test.createTestingModule({
            controllers: [UploadsController],
            providers: [
                {
                    provide: UploadsService,
                    useValue: mockUploadsService,
                },
                {
                    provide: ConfigService,
                    useValue: {
                        get: jest.fn(),
                    },
                },
                {
                    provide: ApiKeyGuard,
                    useValue: { canActivate: () => true },
                },
                {
                    provide: QueryBus,
                    useValue: mockQueryBus,
                },
            ],
        }).compile();

        controller = module.get<UploadsController>(UploadsController);

        jest.clearAllMocks();
    });

    it('should pass the init body to the service', async () => {
        const session = {
            uploadId,
            key,
            chunkSize: 5242880,
            totalChunks: 10,
            completedChunks: 0,
            uploadedParts: [],
            isResume: false,
        };
        mockUploadsService.init.mockResolvedValueOnce(session);

        const result = await controller.init({ fileSignature: 'fc2e9254cb173470', fileName: 'a.txt', fileSize: 52428800 });

        expect(result).toBe(session);
        expect(mockUploadsService.init).toHaveBeenCalledWith('fc2e9254cb173470', 'a.txt', 52428800);
    });

    it('should upload the chunk buffer', async () => {
        const buffer = Buffer.from('chunk data');
        const chunk = { buffer, size: buffer.length } as Express.Multer.File;
        mockUploadsService.uploadChunk.mockResolvedValueOnce({ partNumber: 2, eTag: '"e2"', size: buffer.length });

        const result = await controller.uploadChunk(chunk, { uploadId, key, partNumber: 2 });

        expect(result).toEqual({ partNumber: 2, eTag: '"e2"', size: 10 });
        expect(mockUploadsService.uploadChunk).toHaveBeenCalledWith(uploadId, key, 2, buffer);
    });

    it('should shape the completion result', async () => {
        mockUploadsService.complete.mockResolvedValueOnce({
            status: 'completed',
            key,
            signature: 'fc2e9254cb173470',
            fileName: 'a.txt',
            partCount: 3,
            location: 'http://localhost:9000/bucket/a.txt',
            eTag: '"abc-3"',
        });

        await expect(controller.complete({ uploadId, key })).resolves.toEqual({
            status: 'completed',
            key,
            signature: 'fc2e9254cb173470',
            fileName: 'a.txt',
            location: 'http://localhost:9000/bucket/a.txt',
        });
    });

    it('should abort and run cleanup', async () => {
        mockUploadsService.abort.mockResolvedValueOnce(undefined);
        mockUploadsService.cleanupExpired.mockResolvedValueOnce(2);

        await expect(controller.abort({ uploadId, key })).resolves.toBeUndefined();
        await expect(controller.cleanupExpired({ maxAgeHours: 24 })).resolves.toEqual({ count: 2 });
        expect(mockUploadsService.abort).toHaveBeenCalledWith(uploadId, key);
    });

    it('should query pending uploads and status through the query bus', async () => {
        mockQueryBus.execute.mockResolvedValueOnce([]);
        mockQueryBus.execute.mockResolvedValueOnce({ uploadId });

        await expect(controller.listPending()).resolves.toEqual([]);
        await expect(controller.status(uploadId)).resolves.toEqual({ uploadId });

        expect(mockQueryBus.execute).toHaveBeenNthCalledWith(1, expect.any(GetPendingUploadsQuery));
        expect(mockQueryBus.execute).toHaveBeenNthCalledWith(2, new GetUploadStatusQuery(uploadId));
    });
});
