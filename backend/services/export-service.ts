import { DynamoDBDocumentClient, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { TableConfig } from '../lib/config';
import { toCsv } from '../lib/csv';
import { formatEpochSeconds } from '../lib/format';
import { DetectionExport, DetectionRecord } from '../interfaces';

export const EXPORT_FILE_NAME = 'deepfake_detections.csv';
export const EXPORT_CONTENT_TYPE = 'text/csv';

/**
 * Dependencies of the export flow
 */
export interface ExportDeps {
  dynamoDb: DynamoDBDocumentClient;
  config: TableConfig;
}

/**
 * Rewrite the `timestamp` attribute of every record as a display string.
 * Field order is preserved. A single bad timestamp fails the whole batch.
 *
 * @throws DataShapeError for the first record with a missing or non-integer timestamp
 */
export function normalizeTimestamps(records: DetectionRecord[]): DetectionRecord[] {
  return records.map((record, index) => ({
    ...record,
    timestamp: formatEpochSeconds(record.timestamp, index),
  }));
}

/**
 * Scan the detections table and serialize it as CSV
 *
 * One Scan call, one page: a table larger than a page is only partially read,
 * in which case `truncated` is set on the result.
 *
 * @returns The export, or null when the table holds no records
 * @throws DataShapeError if any record has an unusable timestamp
 */
export async function exportDetections(deps: ExportDeps): Promise<DetectionExport | null> {
  const { tableName } = deps.config;
  console.log(`Scanning DynamoDB table: ${tableName}`);

  const response = await deps.dynamoDb.send(new ScanCommand({ TableName: tableName }));
  const items: DetectionRecord[] = response.Items ?? [];

  if (items.length === 0) {
    console.log('No detection records found');
    return null;
  }

  const truncated = response.LastEvaluatedKey !== undefined;
  if (truncated) {
    console.log(`Scan of ${tableName} returned a partial page; exporting the first ${items.length} records only`);
  }

  const csv = toCsv(normalizeTimestamps(items));
  console.log(`Exported ${items.length} detection records`);

  return {
    fileName: EXPORT_FILE_NAME,
    contentType: EXPORT_CONTENT_TYPE,
    recordCount: items.length,
    truncated,
    csv,
  };
}
