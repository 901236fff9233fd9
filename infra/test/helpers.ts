import * as cdk from 'aws-cdk-lib/core';
import * as path from 'path';
import { InfraStack, InfraStackProps } from '../lib/infra-stack';

export const TEST_PROPS: InfraStackProps = {
  bucketName: 'test-uploads-bucket',
  tableName: 'TestDetections',
  detectionApiUrl: 'https://detector.example.com/detect',
  frontendDistPath: path.join(__dirname, 'fixtures', 'frontend-dist'),
};

/**
 * Build the stack without bundling the Lambda sources
 */
export function createTestStack(overrides: Partial<InfraStackProps> = {}): InfraStack {
  const app = new cdk.App({
    context: { 'aws:cdk:bundling-stacks': [] },
  });
  return new InfraStack(app, 'TestStack', { ...TEST_PROPS, ...overrides });
}
