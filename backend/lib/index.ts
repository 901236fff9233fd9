export {
    getEnvTableName,
    getEnvBucketName,
    getEnvUploadsPrefix,
    getEnvDetectionApiUrl,
    getEnvAwsRegion
} from './env'
export { loadStorageConfig, loadTableConfig, loadDetectionConfig } from './config'
export type { StorageConfig, TableConfig, DetectionConfig } from './config'
export { createS3Client, createDocumentClient, once } from './clients'
export { RemoteDetectionError, StoreDeletionError, DataShapeError } from './errors'
export type { StoreDeletionReason } from './errors'
export { formatTimestamp, formatEpochSeconds, bytesToKilobytes, DISPLAY_TIMESTAMP_FORMAT } from './format'
export { toCsv, toCellText, collectColumns } from './csv'
export {
    createErrorResponse,
    createSuccessResponse,
    createCsvResponse,
    createPassthroughResponse
} from './response'
export type { ErrorStatusCode } from './response'
