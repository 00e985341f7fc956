import { Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ExpiryReaper } from '@uploads';

export const EXPIRY_SWEEP_INTERVAL = 'uploads-expiry-sweep';

/**
 * Periodically aborts upload sessions older than `uploads.cleanup.maxAgeHours`.
 * The interval comes from configuration, so it is registered at bootstrap
 * instead of through a static `@Interval` decorator.
 */
@Injectable()
export class ExpiryScheduler implements OnApplicationBootstrap, OnModuleDestroy {
    private readonly logger = new Logger(ExpiryScheduler.name);
    private readonly enabled: boolean;
    private readonly intervalMs: number;
    private readonly maxAgeHours: number;

    private isRunning = false;

    constructor(
        private readonly expiryReaper: ExpiryReaper,
        private readonly schedulerRegistry: SchedulerRegistry,
        private readonly configService: ConfigService,
    ) {
        this.enabled = this.configService.get<boolean>('uploads.cleanup.enabled', true);
        this.intervalMs = this.configService.get<number>('uploads.cleanup.intervalMinutes', 60) * 60 * 1000;
        this.maxAgeHours = this.configService.get<number>('uploads.cleanup.maxAgeHours', 24);

        if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
            throw new Error(`uploads.cleanup.intervalMinutes must be a positive number, got ${this.intervalMs / 60000}`);
        }
        if (!Number.isFinite(this.maxAgeHours) || this.maxAgeHours <= 0) {
            throw new Error(`uploads.cleanup.maxAgeHours must be a positive number, got ${this.maxAgeHours}`);
        }
    }

    onApplicationBootstrap(): void {
        if (!this.enabled) {
            this.logger.log('Expired upload cleanup is disabled');
            return;
        }

        const interval = setInterval(() => {
            void this.runSweep();
        }, this.intervalMs);
        this.schedulerRegistry.addInterval(EXPIRY_SWEEP_INTERVAL, interval);

        this.logger.log(`Sweeping uploads older than ${this.maxAgeHours}h every ${this.intervalMs / 60000} min`);
    }

    onModuleDestroy(): void {
        if (this.schedulerRegistry.doesExist('interval', EXPIRY_SWEEP_INTERVAL)) {
            this.schedulerRegistry.deleteInterval(EXPIRY_SWEEP_INTERVAL);
        }
    }

    /**
     * One sweep; overlapping runs are skipped.
     * @returns Number of aborted sessions, or `null` when the run was skipped or failed.
     */
    async runSweep(): Promise<number | null> {
        if (this.isRunning) {
            this.logger.warn('Previous sweep still running, skipping');
            return null;
        }

        this.isRunning = true;
        const startTime = Date.now();
        try {
            const count = await this.expiryReaper.sweep(this.maxAgeHours);
            this.logger.log(`Sweep finished in ${Date.now() - startTime}ms, aborted ${count} sessions`);
            return count;
        } catch (error) {
            this.logger.error('Expired upload sweep failed', error instanceof Error ? error.stack : String(error));
            return null;
        } finally {
            this.isRunning = false;
        }
    }
}
