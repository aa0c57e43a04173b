import { GetObjectCommand, ListObjectsV2Command, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { ObjectDescriptor } from '../types.js';
import type { BlobStore, ListPage } from './blob-store.js';

export class S3BlobStore implements BlobStore {
  private readonly client: S3Client;

  constructor(region: string, client?: S3Client) {
    this.client = client ?? new S3Client({ region });
  }

  async listPage(bucket: string, prefix: string, continuationToken?: string): Promise<ListPage> {
    const res = await this.client.send(
      new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken })
    );

    const objects: ObjectDescriptor[] = [];
    for (const item of res.Contents ?? []) {
      if (!item.Key) continue;
      objects.push({
        key: item.Key,
        size: item.Size ?? 0,
        lastModified: item.LastModified?.toISOString() ?? null
      });
    }

    return {
      objects,
      nextToken: res.IsTruncated ? res.NextContinuationToken : undefined
    };
  }

  async get(bucket: string, key: string): Promise<Uint8Array> {
    const res = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!res.Body) {
      throw new Error(`s3://${bucket}/${key} returned no body`);
    }
    return res.Body.transformToByteArray();
  }

  async put(bucket: string, key: string, body: string | Uint8Array, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType
      })
    );
  }
}
