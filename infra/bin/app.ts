#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { Tags } from 'aws-cdk-lib/core';
import * as path from 'path';
import { InfraStack } from '../lib/infra-stack';

const DEFAULT_DETECTION_API_URL = 'https://heql3b8ph0.execute-api.us-east-2.amazonaws.com/detect';

const app = new cdk.App();

/**
 * Read a string context value (`cdk deploy -c bucketName=...`)
 */
function contextString(key: string, fallback: string): string {
  const value: unknown = app.node.tryGetContext(key);
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

new InfraStack(app, 'DeepfakeDashboardStack', {
  bucketName: contextString('bucketName', 'deepfake-uploads'),
  tableName: contextString('tableName', 'DeepfakeDetections'),
  detectionApiUrl: contextString('detectionApiUrl', DEFAULT_DETECTION_API_URL),
  uploadsPrefix: contextString('uploadsPrefix', 'uploads/'),
  frontendDistPath: path.join(__dirname, '..', '..', 'frontend', 'dist'),
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
});

Tags.of(app).add('Project', 'Deepfake-Detection-Dashboard');
