import {
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { StorageConfig } from '../lib/config';
import { StoreDeletionError } from '../lib/errors';
import { bytesToKilobytes, formatTimestamp } from '../lib/format';
import { StoredObject, UploadListing } from '../interfaces';

/**
 * Dependencies of the listing and deletion flows
 */
export interface UploadDeps {
  s3: S3Client;
  config: StorageConfig;
}

/**
 * List the uploaded images under the configured prefix
 *
 * One ListObjectsV2 call, one page. When the bucket holds more objects than
 * a page returns, only the first page is listed and `truncated` is set.
 */
export async function listUploads(deps: UploadDeps): Promise<UploadListing> {
  const { bucketName, uploadsPrefix } = deps.config;
  console.log(`Listing s3://${bucketName}/${uploadsPrefix}`);

  const response = await deps.s3.send(new ListObjectsV2Command({
    Bucket: bucketName,
    Prefix: uploadsPrefix,
  }));

  const objects: StoredObject[] = (response.Contents ?? []).map(object => ({
    key: object.Key ?? '',
    sizeKb: bytesToKilobytes(object.Size ?? 0),
    lastModified: object.LastModified ? formatTimestamp(object.LastModified) : '',
  }));

  return {
    prefix: uploadsPrefix,
    objects,
    truncated: response.IsTruncated === true,
  };
}

/**
 * Delete one uploaded image by its exact key
 *
 * The object is looked up first so that a key which no longer exists is
 * reported instead of being silently accepted by S3.
 *
 * @throws StoreDeletionError with reason `invalid-key` for keys outside the
 *         prefix, `not-found` for missing objects, `store-error` otherwise
 */
export async function deleteUpload(deps: UploadDeps, key: string): Promise<void> {
  const { bucketName, uploadsPrefix } = deps.config;

  if (!key.startsWith(uploadsPrefix) || key.length === uploadsPrefix.length) {
    throw new StoreDeletionError(key, 'invalid-key', `Key must name an object under ${uploadsPrefix}`);
  }

  try {
    await deps.s3.send(new HeadObjectCommand({ Bucket: bucketName, Key: key }));
  } catch (error) {
    if (isNotFound(error)) {
      throw new StoreDeletionError(key, 'not-found', `Object not found: ${key}`, { cause: error });
    }
    throw toStoreError(key, error);
  }

  console.log(`Deleting S3 object: s3://${bucketName}/${key}`);
  try {
    await deps.s3.send(new DeleteObjectCommand({ Bucket: bucketName, Key: key }));
  } catch (error) {
    throw toStoreError(key, error);
  }
  console.log(`Successfully deleted S3 object: ${key}`);
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404)
  );
}

function toStoreError(key: string, error: unknown): StoreDeletionError {
  const message = error instanceof Error ? error.message : String(error);
  return new StoreDeletionError(key, 'store-error', message, { cause: error });
}
