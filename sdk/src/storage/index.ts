export { MemoryVectorStore } from './MemoryVectorStore';
export { SQLiteProductStore } from './SQLiteProductStore';
export type { SQLiteProductStoreConfig } from './SQLiteProductStore';
