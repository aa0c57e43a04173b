import type { ObjectDescriptor } from '../types.js';

export interface ListPage {
  objects: ObjectDescriptor[];
  nextToken?: string;
}

/** Minimal object-store surface the pipeline needs. */
export interface BlobStore {
  listPage(bucket: string, prefix: string, continuationToken?: string): Promise<ListPage>;
  get(bucket: string, key: string): Promise<Uint8Array>;
  put(bucket: string, key: string, body: string | Uint8Array, contentType: string): Promise<void>;
}

export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';
export const JSON_CONTENT_TYPE = 'application/json';
