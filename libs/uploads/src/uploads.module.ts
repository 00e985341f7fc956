import { Module } from '@nestjs/common';
import { FilesModule } from '@files';
import { UploadCoordinator } from './services/upload-coordinator.service';
import { ExpiryReaper } from './services/expiry-reaper.service';

@Module({
    imports: [FilesModule],
    providers: [UploadCoordinator, ExpiryReaper],
    exports: [UploadCoordinator, ExpiryReaper],
})
export class UploadsModule { }
