export {
  createMemoryBlobStore,
  type MemoryBlobStoreConfig,
} from "./memory-storage.ts";
