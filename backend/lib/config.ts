import {
  getEnvAwsRegion,
  getEnvBucketName,
  getEnvDetectionApiUrl,
  getEnvTableName,
  getEnvUploadsPrefix,
} from './env';

/**
 * Object store settings used by the listing and deletion flows
 */
export interface StorageConfig {
  region?: string;
  bucketName: string;
  uploadsPrefix: string;
}

/**
 * Key-value table settings used by the export flow
 */
export interface TableConfig {
  region?: string;
  tableName: string;
}

/**
 * Remote detection endpoint used by the submission flow
 */
export interface DetectionConfig {
  detectionApiUrl: string;
}

/**
 * @throws Error if BUCKET_NAME is not set
 */
export function loadStorageConfig(): StorageConfig {
  return {
    region: getEnvAwsRegion(),
    bucketName: getEnvBucketName(),
    uploadsPrefix: getEnvUploadsPrefix(),
  };
}

/**
 * @throws Error if TABLE_NAME is not set
 */
export function loadTableConfig(): TableConfig {
  return {
    region: getEnvAwsRegion(),
    tableName: getEnvTableName(),
  };
}

/**
 * @throws Error if DETECTION_API_URL is not set
 */
export function loadDetectionConfig(): DetectionConfig {
  return {
    detectionApiUrl: getEnvDetectionApiUrl(),
  };
}
