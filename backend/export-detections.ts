import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import {
  createCsvResponse,
  createDocumentClient,
  createErrorResponse,
  createSuccessResponse,
  DataShapeError,
  loadTableConfig,
  once,
} from './lib';
import { exportDetections, ExportDeps } from './services/export-service';

/**
 * ExportDetections Lambda Function
 *
 * GET /detections/export: scans the detections table and returns it as a
 * CSV download. An empty table answers 204 so the dashboard can show its
 * "no data" notice instead of a download button.
 *
 * A record with an unusable timestamp aborts the export with 422; nothing is
 * skipped silently.
 *
 * @param resolveDeps Supplies the flow's dependencies; tests pass their own
 * @returns Lambda handler
 */
export const createHandler = (
  resolveDeps: () => ExportDeps = once(() => {
    const config = loadTableConfig();
    return { config, dynamoDb: createDocumentClient(config) };
  })
) => async (
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<APIGatewayProxyStructuredResultV2> => {
  console.log('Event received', JSON.stringify(event, null, 2));
  console.log('Lambda Context', JSON.stringify(context, null, 2));

  let deps: ExportDeps;
  try {
    deps = resolveDeps();
  } catch (error) {
    return createErrorResponse(500, error);
  }

  try {
    const detectionExport = await exportDetections(deps);
    if (!detectionExport) {
      return createSuccessResponse();
    }
    return createCsvResponse(detectionExport.csv, detectionExport.fileName);
  } catch (error) {
    if (error instanceof DataShapeError) {
      return createErrorResponse(422, error.message);
    }
    return createErrorResponse(500, 'Failed to export detection records', error);
  }
};

export const handler = createHandler();
