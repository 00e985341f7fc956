import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OBJECT_STORE, ObjectStore } from './object-store.port';
import { S3ObjectStore } from './s3-object.store';
import { InMemoryObjectStore } from './in-memory-object.store';

export type StorageDriver = 's3' | 'memory';

@Module({
    providers: [
        {
            provide: OBJECT_STORE,
            useFactory: (configService: ConfigService): ObjectStore => {
                const driver = configService.get<StorageDriver>('storage.driver', 's3');
                if (driver === 'memory') {
                    new Logger('FilesModule').warn('Using the in-memory object store; uploads will not survive a restart');
                    return new InMemoryObjectStore();
                }
                return new S3ObjectStore(configService);
            },
            inject: [ConfigService],
        },
    ],
    exports: [OBJECT_STORE],
})
export class FilesModule { }
