export { MongoDBVectorStore } from './MongoDBVectorStore';
export type { MongoDBVectorStoreConfig } from './MongoDBVectorStore';
