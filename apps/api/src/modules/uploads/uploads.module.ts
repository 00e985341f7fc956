import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CqrsModule } from "@nestjs/cqrs";
import { MulterModule } from "@nestjs/platform-express";
import { UploadsModule } from "@uploads";
import { UploadsController } from "./controllers/uploads.controller";
import { UploadsService } from "./services/uploads.service";
import { ApiKeyGuard } from "../../common/guards/api-key.guard";
import { GetPendingUploadsHandler } from "./queries/get-pending-uploads.handler";
import { GetUploadStatusHandler } from "./queries/get-upload-status.handler";
import { UploadCompletedHandler } from "./events/upload-completed.handler";

@Module({
    imports: [
        UploadsModule,
        CqrsModule,
        MulterModule.registerAsync({
            useFactory: (configService: ConfigService) => ({
                limits: {
                    fileSize: configService.get<number>('uploads.maxChunkBytes'),
                    files: 1,
                },
            }),
            inject: [ConfigService],
        }),
    ],
    controllers: [
        UploadsController],
    providers: [
        GetPendingUploadsHandler,
        GetUploadStatusHandler,
        UploadCompletedHandler,
        UploadsService,
        ApiKeyGuard
    ],
})
export class UploadsApiModule { }
