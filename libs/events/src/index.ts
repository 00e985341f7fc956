export * from './events/base-event';
export * from './events/upload-completed.event';
