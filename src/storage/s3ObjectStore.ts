import {
  S3Client,
  ListObjectsV2Command,
  GetObjectCommand,
  type ListObjectsV2CommandOutput,
  type GetObjectCommandOutput,
} from '@aws-sdk/client-s3';
import { Readable } from 'stream';
import type { ObjectStore } from './objectStore.js';
import type { ObjectDescriptor } from '../types.js';

export type S3StoreOptions = {
  profile?: string;
  region?: string;
};

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;

  constructor(opts: S3StoreOptions = {}, client?: S3Client) {
    // profile and region fall back to the SDK's default resolution chain
    this.client = client ?? new S3Client({
      ...(opts.region ? { region: opts.region } : {}),
      ...(opts.profile ? { profile: opts.profile } : {}),
    });
  }

  async *list(bucket: string, prefix: string): AsyncGenerator<ObjectDescriptor> {
    let token: string | undefined;
    do {
      const page = await this.listPage(bucket, prefix, token);
      for (const item of page.Contents ?? []) {
        if (!item.Key || !item.LastModified) continue;
        yield { key: item.Key, lastModified: item.LastModified };
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
  }

  async get(bucket: string, key: string): Promise<Readable> {
    const response = await this.getObject(bucket, key);
    if (response.Body instanceof Readable) {
      return response.Body;
    }
    if (response.Body) {
      // Non-Node runtimes hand back a web stream or blob instead
      const bytes = await response.Body.transformToByteArray();
      return Readable.from([Buffer.from(bytes)]);
    }
    throw new Error(`Empty body in S3 download of s3://${bucket}/${key}`);
  }

  protected listPage(bucket: string, prefix: string, token?: string): Promise<ListObjectsV2CommandOutput> {
    return this.client.send(new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: token }));
  }

  protected getObject(bucket: string, key: string): Promise<GetObjectCommandOutput> {
    return this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  }

  destroy() {
    this.client.destroy();
  }
}
