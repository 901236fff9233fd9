import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { S3Client } from '@aws-sdk/client-s3';

/**
 * AWS SDK client factories
 *
 * Handlers call these once per execution context (see {@link once}) and hand
 * the clients to their flow functions, so warm invocations reuse the same
 * connections.
 */

export function createS3Client(config: { region?: string }): S3Client {
  return new S3Client({ region: config.region });
}

/**
 * DynamoDBDocumentClient unmarshalls items into plain JavaScript values,
 * so records reach the export flow without AttributeValue wrappers.
 */
export function createDocumentClient(config: { region?: string }): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient({ region: config.region }));
}

/**
 * Wrap a factory so it runs on first use and its result is reused afterwards.
 * A factory that throws is retried on the next call.
 */
export function once<T>(factory: () => T): () => T {
  let cached: { value: T } | undefined;
  return () => {
    if (!cached) {
      cached = { value: factory() };
    }
    return cached.value;
  };
}
