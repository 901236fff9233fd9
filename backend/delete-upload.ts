import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import {
  createErrorResponse,
  createS3Client,
  createSuccessResponse,
  ErrorStatusCode,
  loadStorageConfig,
  once,
  StoreDeletionError,
  StoreDeletionReason,
} from './lib';
import { deleteUpload, UploadDeps } from './services/upload-service';

const STATUS_BY_REASON: Record<StoreDeletionReason, ErrorStatusCode> = {
  'invalid-key': 400,
  'not-found': 404,
  'store-error': 500,
};

/**
 * DeleteUpload Lambda Function
 *
 * DELETE /uploads/{key+}: removes one uploaded image from the bucket.
 * The route uses a greedy path parameter so keys containing slashes
 * (`uploads/abc.jpg`) arrive whole; the frontend URL-encodes the key and it
 * is decoded here.
 *
 * Responds 204 on success. Failures carry the store's error text so the
 * operator sees why the delete did not happen.
 *
 * @param resolveDeps Supplies the flow's dependencies; tests pass their own
 * @returns Lambda handler
 */
export const createHandler = (
  resolveDeps: () => UploadDeps = once(() => {
    const config = loadStorageConfig();
    return { config, s3: createS3Client(config) };
  })
) => async (
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<APIGatewayProxyStructuredResultV2> => {
  console.log('Event received', JSON.stringify(event, null, 2));
  console.log('Lambda Context', JSON.stringify(context, null, 2));

  const rawKey = event.pathParameters?.key;
  if (!rawKey) {
    return createErrorResponse(400, 'key is required in path parameters');
  }
  let key: string;
  try {
    key = decodeURIComponent(rawKey);
  } catch (error) {
    return createErrorResponse(400, 'key is not a valid URL-encoded path', error);
  }
  console.log(`Deleting upload: ${key}`);

  let deps: UploadDeps;
  try {
    deps = resolveDeps();
  } catch (error) {
    return createErrorResponse(500, error);
  }

  try {
    await deleteUpload(deps, key);
    return createSuccessResponse();
  } catch (error) {
    if (error instanceof StoreDeletionError) {
      return createErrorResponse(STATUS_BY_REASON[error.reason], error.message, error.cause);
    }
    return createErrorResponse(500, error, error);
  }
};

export const handler = createHandler();
