import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import {
  createErrorResponse,
  createPassthroughResponse,
  createSuccessResponse,
  loadDetectionConfig,
  once,
  RemoteDetectionError,
} from './lib';
import { DetectionDeps, submitDetection } from './services/detection-service';

/**
 * SubmitDetection Lambda Function
 *
 * POST /detections: forwards `{"file_url": ...}` to the remote detection
 * endpoint and relays its answer:
 * - 200 with a detection result: the result as JSON
 * - any other upstream status: same status, raw upstream body
 * - 200 with an unusable body: 502, raw upstream body
 * - upstream unreachable: 502 JSON error
 *
 * The URL is only checked for being non-empty; reachability and format are
 * left to the detection service.
 *
 * @param resolveDeps Supplies the flow's dependencies; tests pass their own
 * @returns Lambda handler
 */
export const createHandler = (
  resolveDeps: () => DetectionDeps = once(() => ({
    config: loadDetectionConfig(),
    fetch,
  }))
) => async (
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<APIGatewayProxyStructuredResultV2> => {
  console.log('Event received', JSON.stringify(event, null, 2));
  console.log('Lambda Context', JSON.stringify(context, null, 2));

  const fileUrl = readFileUrl(event);
  if (!fileUrl) {
    return createErrorResponse(400, 'file_url is required');
  }

  let deps: DetectionDeps;
  try {
    deps = resolveDeps();
  } catch (error) {
    return createErrorResponse(500, error);
  }

  try {
    console.log(`Submitting ${fileUrl} for detection`);
    const result = await submitDetection(deps, fileUrl);
    console.log(`Detection verdict: ${result.verdict} (confidence: ${result.confidence})`);
    return createSuccessResponse(result);
  } catch (error) {
    if (error instanceof RemoteDetectionError && error.status !== undefined) {
      // An unusable 200 is relayed verbatim as a 502
      const statusCode = error.status === 200 ? 502 : error.status;
      console.error(`Detection failed with status ${error.status}: ${error.body}`);
      return createPassthroughResponse(statusCode, error.body);
    }
    return createErrorResponse(502, error, error);
  }
};

/**
 * Extract a non-empty `file_url` string from the request body
 */
function readFileUrl(event: APIGatewayProxyEventV2): string | undefined {
  if (!event.body) {
    return undefined;
  }
  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf-8')
    : event.body;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'file_url' in parsed &&
    typeof parsed.file_url === 'string' &&
    parsed.file_url.trim() !== ''
  ) {
    return parsed.file_url;
  }
  return undefined;
}

export const handler = createHandler();
