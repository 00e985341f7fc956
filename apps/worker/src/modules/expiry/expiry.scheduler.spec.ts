import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ExpiryReaper } from '@uploads';
import { EXPIRY_SWEEP_INTERVAL, ExpiryScheduler } from './expiry.scheduler';

describe('ExpiryScheduler', () => {
    let scheduler: ExpiryScheduler;
    let schedulerRegistry: SchedulerRegistry;

    const mockExpiryReaper = {
        sweep: jest.fn(),
    };

    async function createScheduler(cleanup: Record<string, unknown>): Promise<void> {
        const module: TestingModule = await Test.createTestingModule({
            providers: [
                ExpiryScheduler,
                SchedulerRegistry,
                {
                    provide: ExpiryReaper,
                    useValue: mockExpiryReaper,
                },
                {
                    provide: ConfigService,
                    useValue: new ConfigService({ uploads: { cleanup } }),
                },
            ],
        }).compile();

        scheduler = module.get<ExpiryScheduler>(ExpiryScheduler);
        schedulerRegistry = module.get<SchedulerRegistry>(SchedulerRegistry);
    }

    beforeEach(() => {
        jest.clearAllMocks();
    });

    afterEach(() => {
        scheduler?.onModuleDestroy();
    });

    it('should sweep with the configured age', async () => {
        await createScheduler({ maxAgeHours: 12 });
        mockExpiryReaper.sweep.mockResolvedValueOnce(4);

        await expect(scheduler.runSweep()).resolves.toBe(4);
        expect(mockExpiryReaper.sweep).toHaveBeenCalledWith(12);
    });

    it('should skip a sweep while the previous one is still running', async () => {
        await createScheduler({});
        let finish: (count: number) => void = () => undefined;
        mockExpiryReaper.sweep.mockReturnValueOnce(new Promise<number>((resolve) => {
            finish = resolve;
        }));

        const first = scheduler.runSweep();
        await expect(scheduler.runSweep()).resolves.toBeNull();
        finish(1);

        await expect(first).resolves.toBe(1);
        expect(mockExpiryReaper.sweep).toHaveBeenCalledTimes(1);
        expect(mockExpiryReaper.sweep).toHaveBeenCalledWith(24);
    });

    it('should log and swallow a failed sweep', async () => {
        await createScheduler({});
        mockExpiryReaper.sweep.mockRejectedValueOnce(new Error('storage down'));

        await expect(scheduler.runSweep()).resolves.toBeNull();
        mockExpiryReaper.sweep.mockResolvedValueOnce(0);
        await expect(scheduler.runSweep()).resolves.toBe(0);
    });

    it('should register the interval on bootstrap and remove it on shutdown', async () => {
        await createScheduler({ intervalMinutes: 30 });

        scheduler.onApplicationBootstrap();
        expect(schedulerRegistry.getIntervals()).toEqual([EXPIRY_SWEEP_INTERVAL]);

        scheduler.onModuleDestroy();
        expect(schedulerRegistry.getIntervals()).toEqual([]);
    });

    it('should refuse a non-positive interval or age', async () => {
        await expect(createScheduler({ intervalMinutes: 0 })).rejects.toThrow('uploads.cleanup.intervalMinutes');
        await expect(createScheduler({ intervalMinutes: -5 })).rejects.toThrow('uploads.cleanup.intervalMinutes');
        await expect(createScheduler({ maxAgeHours: 0 })).rejects.toThrow('uploads.cleanup.maxAgeHours');
    });

    it('should not register anything when disabled', async () => {
        await createScheduler({ enabled: false });

        scheduler.onApplicationBootstrap();

        expect(schedulerRegistry.getIntervals()).toEqual([]);
    });
});
