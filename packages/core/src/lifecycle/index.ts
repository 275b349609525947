export * from './service';
export * from './store';
export * from './json_store';
export * from './state_machine';
export { newRecordId } from './ids';
export { LIFECYCLE_SCHEMA_VERSION, LifecycleDocumentSchema, type LifecycleDocument } from './schema';
