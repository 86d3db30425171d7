/**
 * S3-backed object store.
 */

import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { StorageError } from '../lib/errors.js'
import type { ObjectStore } from './object-store.js'

/** The slice of S3Client this store uses. */
export interface S3Sender {
  send(command: PutObjectCommand): Promise<unknown>
}

export interface S3ObjectStoreOptions {
  bucket: string
  region?: string
  client?: S3Sender
}

export class S3ObjectStore implements ObjectStore {
  private readonly bucket: string
  private readonly client: S3Sender

  constructor(options: S3ObjectStoreOptions) {
    this.bucket = options.bucket
    // Credentials come from the environment or the execution role
    this.client = options.client ?? new S3Client({ region: options.region ?? 'us-east-1' })
  }

  async putObject(key: string, body: string, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        })
      )
    } catch (error) {
      throw new StorageError(key, error)
    }
  }
}
