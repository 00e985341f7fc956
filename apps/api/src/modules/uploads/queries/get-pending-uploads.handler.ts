import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { UploadCoordinator } from '@uploads';
import { GetPendingUploadsQuery } from './get-pending-uploads.query';
import { PendingUploadDto } from '../dto/upload-response.dto';
import { toPendingUploadDto } from './pending-upload.mapper';

@QueryHandler(GetPendingUploadsQuery)
export class GetPendingUploadsHandler implements IQueryHandler<GetPendingUploadsQuery, PendingUploadDto[]> {
    constructor(private readonly uploadCoordinator: UploadCoordinator) { }

    async execute(): Promise<PendingUploadDto[]> {
        const pending = await this.uploadCoordinator.listPending();
        return pending.map(toPendingUploadDto);
    }
}
