import { Module } from '@nestjs/common';
import { UploadsModule } from '@uploads';
import { ExpiryScheduler } from './expiry.scheduler';

@Module({
    imports: [UploadsModule],
    providers: [ExpiryScheduler],
})
export class ExpiryModule { }
