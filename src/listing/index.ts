export { ListObjectsIterator } from './iterator.js';
export type { ListingState, ListObjectsOptions, PageFetcher } from './iterator.js';
