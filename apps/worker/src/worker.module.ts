import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import workerConfig from './worker.config';
import { ExpiryModule } from './modules/expiry/expiry.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [workerConfig],
    }),
    ScheduleModule.forRoot(),
    ExpiryModule,
  ],
})
export class WorkerModule { }
