export * from './constants';
export * from './errors';
export * from './signature';
export * from './key-codec';
export * from './pagination';
export * from './interfaces/upload-session.interface';
export * from './services/upload-coordinator.service';
export * from './services/expiry-reaper.service';
export * from './uploads.module';
