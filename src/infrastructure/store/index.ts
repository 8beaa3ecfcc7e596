export { registryRecords } from './schema.js';
export { createDbClient, ensureRegistrySchema } from './client.js';
export type { Database, DbClient } from './client.js';
export { MemoryBackend, MemoryStore, createMemoryHandles, matchesFilter } from './memory-store.js';
export { PostgresStore } from './postgres-store.js';
export { parseRecord, recordSchemas } from './record-schemas.js';
export { openStoreHandles } from './handles.js';
export type {
  CollectionName,
  CollectionRecords,
  ListOptions,
  RecordFilter,
  RecordOf,
  RegistryStore,
  StoreHandles,
} from './types.js';
