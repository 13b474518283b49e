export * from './model.js';
export { splitGraphemes, GraphemeCursor } from './parser/graphemes.js';
export { metadataEvents, applyMetadata, parseCalendarDate, type MetadataEvent, type FieldError } from './parser/metadata.js';
export { parseLine, parseLineDetailed, extractTags, type ParsedLine } from './parser/line.js';
export { renderTask } from './parser/render.js';
export * from './store/taskStore.js';
export { JsonTaskStore, type JsonTaskStoreOptions } from './store/jsonStore.js';
export { MemoryTaskStore } from './store/memoryStore.js';
export { fieldsEqual, recordFromStore, STATUS_FROM_STORE, STATUS_TO_STORE, type FieldDiff, type FieldName } from './sync/fields.js';
export { Reconciler, type ReconcileOutcome, type SyncDirection, type TaskSource } from './sync/reconcile.js';
export { SyncEngine, type FileReport, type SyncReport, type SyncOptions } from './sync/engine.js';
export { applyLineUpdates, type LineUpdate } from './files/patch.js';
export { findTaskFiles } from './files/scan.js';
export { createLogger, type Logger, type LogLevel } from './log.js';
