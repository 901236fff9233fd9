/**
 * Get the DynamoDB table name from environment variables
 * @returns DynamoDB table name
 * @throws Error if the environment variable is not set
 */
export function getEnvTableName(): string {
  return getEnvStringVar('TABLE_NAME');
}

/**
 * Get the S3 bucket name from environment variables
 * @returns S3 bucket name
 * @throws Error if the environment variable is not set
 */
export function getEnvBucketName(): string {
  return getEnvStringVar('BUCKET_NAME');
}

/**
 * Get the key prefix under which uploaded images are listed and deleted
 * @returns Key prefix, `uploads/` unless overridden
 */
export function getEnvUploadsPrefix(defaultValue = 'uploads/'): string {
  return getEnvStringVar('UPLOADS_PREFIX', defaultValue);
}

/**
 * Get the URL of the remote detection endpoint
 * @returns Detection endpoint URL
 * @throws Error if the environment variable is not set
 */
export function getEnvDetectionApiUrl(): string {
  return getEnvStringVar('DETECTION_API_URL');
}

/**
 * Get the AWS region; undefined lets the SDK resolve it from its default chain
 */
export function getEnvAwsRegion(): string | undefined {
  return process.env.AWS_REGION || undefined;
}

/**
 * Helper function to retrieve and validate string environment variables
 * @param varName Name of the environment variable
 * @param defaultValue Optional value used when the variable is not set
 * @returns Value of the environment variable
 * @throws Error if the environment variable is not set and no default is given
 */
function getEnvStringVar(varName: string, defaultValue?: string): string {
  const value = process.env[varName];
  if (value) {
    return value;
  }
  if (defaultValue === undefined) {
    throw new Error(`${varName} environment variable is not set`);
  }
  return defaultValue;
}
