/**
 * Blob storage keyed by string paths. put overwrites whatever is at the key.
 */
export interface ObjectStore {
  putObject(key: string, body: string, contentType: string): Promise<void>
}
