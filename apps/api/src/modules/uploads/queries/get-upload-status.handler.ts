import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { UploadCoordinator } from '@uploads';
import { GetUploadStatusQuery } from './get-upload-status.query';
import { PendingUploadDto } from '../dto/upload-response.dto';
import { toPendingUploadDto } from './pending-upload.mapper';

@QueryHandler(GetUploadStatusQuery)
export class GetUploadStatusHandler implements IQueryHandler<GetUploadStatusQuery, PendingUploadDto> {
    constructor(private readonly uploadCoordinator: UploadCoordinator) { }

    async execute(query: GetUploadStatusQuery): Promise<PendingUploadDto> {
        return toPendingUploadDto(await this.uploadCoordinator.status(query.uploadId));
    }
}
