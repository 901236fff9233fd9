import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { ApiConstruct, HostingConstruct } from './constructs';

export interface InfraStackProps extends cdk.StackProps {
  /** Existing bucket the detection service stores uploaded images in */
  readonly bucketName: string;
  /** Existing table the detection service writes records to */
  readonly tableName: string;
  /** Endpoint of the external detection service */
  readonly detectionApiUrl: string;
  /** Defaults to `uploads/` */
  readonly uploadsPrefix?: string;
  readonly frontendDistPath: string;
}

/**
 * Deepfake detection research dashboard.
 *
 * The bucket and table are owned by the detection service and only referenced
 * here by name; this stack never creates or deletes them.
 */
export class InfraStack extends cdk.Stack {
  public readonly lambdaExecutionRole: iam.Role;
  public readonly uploadBucket: s3.IBucket;
  public readonly detectionTable: dynamodb.ITable;
  public readonly api: ApiConstruct;
  public readonly hosting: HostingConstruct;

  constructor(scope: Construct, id: string, props: InfraStackProps) {
    super(scope, id, props);

    /**
     * Base execution role with CloudWatch Logs permissions only.
     * Store access is granted per function by ApiConstruct.
     */
    this.lambdaExecutionRole = new iam.Role(this, 'LambdaExecutionRole', {
      description: 'Execution role for the dashboard Lambda functions',
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole'),
      ],
    });

    this.uploadBucket = s3.Bucket.fromBucketName(this, 'UploadBucket', props.bucketName);
    this.detectionTable = dynamodb.Table.fromTableName(this, 'DetectionTable', props.tableName);

    this.api = new ApiConstruct(this, 'Api', {
      bucket: this.uploadBucket,
      uploadsPrefix: props.uploadsPrefix ?? 'uploads/',
      table: this.detectionTable,
      detectionApiUrl: props.detectionApiUrl,
      executionRole: this.lambdaExecutionRole,
    });

    this.hosting = new HostingConstruct(this, 'Hosting', {
      frontendDistPath: props.frontendDistPath,
    });

    // The dashboard is built with VITE_API_URL set to this value
    new cdk.CfnOutput(this, 'ApiUrl', {
      value: this.api.httpApi.apiEndpoint,
      description: 'Base URL of the dashboard HTTP API',
    });

    new cdk.CfnOutput(this, 'DashboardUrl', {
      value: `https://${this.hosting.distribution.distributionDomainName}`,
      description: 'CloudFront URL of the dashboard',
    });
  }
}
