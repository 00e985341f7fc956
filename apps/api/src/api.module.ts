import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { CqrsModule } from '@nestjs/cqrs';
import apiConfig from './api.config';
import { UploadsApiModule } from './modules/uploads/uploads.module';
import { UploadExceptionFilter } from './common/filters/upload-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [apiConfig],
    }),
    CqrsModule.forRoot(),
    UploadsApiModule,
  ],
  controllers: [],
  providers: [
    {
      provide: APP_FILTER,
      useClass: UploadExceptionFilter,
    },
  ],
})
export class ApiModule { }
