import { ListingError } from '../errors.js';
import type { ObjectDescriptor } from '../types.js';
import type { BlobStore, ListPage } from './blob-store.js';

/**
 * Yield every object under `prefix`, page by page. Lazy and restartable only
 * from the beginning; any listing failure ends the walk with `ListingError`.
 */
export async function* walkObjects(store: BlobStore, bucket: string, prefix: string): AsyncGenerator<ObjectDescriptor> {
  const seenTokens = new Set<string>();
  let token: string | undefined;

  do {
    let page: ListPage;
    try {
      page = await store.listPage(bucket, prefix, token);
    } catch (error) {
      throw new ListingError(bucket, prefix, error);
    }

    for (const obj of page.objects) {
      yield obj;
    }

    token = page.nextToken;
    if (token !== undefined) {
      if (seenTokens.has(token)) {
        throw new ListingError(bucket, prefix, new Error(`continuation token repeated: ${token}`));
      }
      seenTokens.add(token);
    }
  } while (token !== undefined);
}
