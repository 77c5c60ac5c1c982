/**
 * Test support: an in-process store to plug in as the client's transport
 *
 * @module testing
 */

export { InMemoryObjectStore } from './in-memory-store.js';
export type {
  InMemoryObjectStoreOptions,
  ParsedStoreRequest,
  RequestInterceptor,
  StoredObject,
} from './in-memory-store.js';
