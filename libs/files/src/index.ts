export * from './object-store.port';
export * from './object-store.error';
export * from './s3-object.store';
export * from './in-memory-object.store';
export * from './files.module';
