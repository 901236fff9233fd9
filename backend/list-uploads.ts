import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import { createErrorResponse, createS3Client, createSuccessResponse, loadStorageConfig, once } from './lib';
import { listUploads, UploadDeps } from './services/upload-service';

/**
 * ListUploads Lambda Function
 *
 * GET /uploads: lists the images stored under the uploads prefix, shaped
 * for display (key, size in KB, last-modified time).
 *
 * The S3 client and configuration are resolved on the first invocation and
 * reused by later invocations of the same execution context.
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

  let deps: UploadDeps;
  try {
    deps = resolveDeps();
  } catch (error) {
    return createErrorResponse(500, error);
  }

  try {
    const listing = await listUploads(deps);
    console.log(`Successfully listed ${listing.objects.length} objects`);
    return createSuccessResponse(listing);
  } catch (error) {
    return createErrorResponse(500, 'Failed to list uploaded images', error);
  }
};

export const handler = createHandler();
