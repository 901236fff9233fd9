import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as apigatewayv2 from 'aws-cdk-lib/aws-apigatewayv2';
import { HttpLambdaIntegration } from 'aws-cdk-lib/aws-apigatewayv2-integrations';
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs';
import * as path from 'path';

const BACKEND_DIR = path.join(__dirname, '..', '..', '..', 'backend');

/**
 * Properties for the dashboard API.
 */
export interface ApiProps {
  /** Bucket holding the uploaded images; created outside this stack */
  readonly bucket: s3.IBucket;
  /** Key prefix the listing and delete flows are restricted to */
  readonly uploadsPrefix: string;
  /** Table the detection service writes its records to */
  readonly table: dynamodb.ITable;
  /** Endpoint of the external detection service */
  readonly detectionApiUrl: string;
  readonly executionRole: iam.IRole;
}

/**
 * ApiConstruct
 *
 * HTTP API with one Lambda per dashboard flow:
 * - POST /detections          relays an image URL to the detection service
 * - GET /uploads              lists the first page of uploaded images
 * - DELETE /uploads/{key+}    deletes one uploaded image by exact key
 * - GET /detections/export    returns every detection record as CSV
 *
 * Each function gets only the grants its flow needs on the shared execution role.
 */
export class ApiConstruct extends Construct {
  public readonly httpApi: apigatewayv2.HttpApi;
  public readonly submitDetectionFunction: NodejsFunction;
  public readonly listUploadsFunction: NodejsFunction;
  public readonly deleteUploadFunction: NodejsFunction;
  public readonly exportDetectionsFunction: NodejsFunction;

  constructor(scope: Construct, id: string, props: ApiProps) {
    super(scope, id);

    const storageEnvironment = {
      BUCKET_NAME: props.bucket.bucketName,
      UPLOADS_PREFIX: props.uploadsPrefix,
    };
    const uploadedObjects = `${props.uploadsPrefix}*`;

    this.submitDetectionFunction = this.createFunction('SubmitDetectionFunction', {
      entry: 'submit-detection.ts',
      description: 'Relays an image URL to the deepfake detection service',
      role: props.executionRole,
      // The detection service downloads and scores the image before it answers
      timeout: cdk.Duration.seconds(60),
      environment: {
        DETECTION_API_URL: props.detectionApiUrl,
      },
    });

    this.listUploadsFunction = this.createFunction('ListUploadsFunction', {
      entry: 'list-uploads.ts',
      description: 'Lists the uploaded images under the uploads prefix',
      role: props.executionRole,
      environment: storageEnvironment,
    });
    props.bucket.grantRead(this.listUploadsFunction, uploadedObjects);

    this.deleteUploadFunction = this.createFunction('DeleteUploadFunction', {
      entry: 'delete-upload.ts',
      description: 'Deletes one uploaded image by its exact key',
      role: props.executionRole,
      environment: storageEnvironment,
    });
    // HeadObject needs read access to tell a missing key from a denied one
    props.bucket.grantRead(this.deleteUploadFunction, uploadedObjects);
    props.bucket.grantDelete(this.deleteUploadFunction, uploadedObjects);

    this.exportDetectionsFunction = this.createFunction('ExportDetectionsFunction', {
      entry: 'export-detections.ts',
      description: 'Exports all detection records as CSV',
      role: props.executionRole,
      environment: {
        TABLE_NAME: props.table.tableName,
      },
    });
    props.table.grantReadData(this.exportDetectionsFunction);

    this.httpApi = new apigatewayv2.HttpApi(this, 'HttpApi', {
      apiName: 'DeepfakeDetectionDashboardApi',
      description: 'HTTP API for the deepfake detection research dashboard',
      corsPreflight: {
        allowOrigins: ['*'],
        allowMethods: [
          apigatewayv2.CorsHttpMethod.GET,
          apigatewayv2.CorsHttpMethod.POST,
          apigatewayv2.CorsHttpMethod.DELETE,
          apigatewayv2.CorsHttpMethod.OPTIONS,
        ],
        allowHeaders: ['Content-Type'],
      },
    });

    this.httpApi.addRoutes({
      path: '/detections',
      methods: [apigatewayv2.HttpMethod.POST],
      integration: new HttpLambdaIntegration('SubmitDetectionIntegration', this.submitDetectionFunction),
    });

    this.httpApi.addRoutes({
      path: '/uploads',
      methods: [apigatewayv2.HttpMethod.GET],
      integration: new HttpLambdaIntegration('ListUploadsIntegration', this.listUploadsFunction),
    });

    /**
     * Greedy path parameter: object keys contain slashes. The frontend
     * URL-encodes the key and the handler decodes it again.
     */
    this.httpApi.addRoutes({
      path: '/uploads/{key+}',
      methods: [apigatewayv2.HttpMethod.DELETE],
      integration: new HttpLambdaIntegration('DeleteUploadIntegration', this.deleteUploadFunction),
    });

    this.httpApi.addRoutes({
      path: '/detections/export',
      methods: [apigatewayv2.HttpMethod.GET],
      integration: new HttpLambdaIntegration('ExportDetectionsIntegration', this.exportDetectionsFunction),
    });
  }

  private createFunction(
    id: string,
    options: {
      entry: string;
      description: string;
      role: iam.IRole;
      environment: Record<string, string>;
      timeout?: cdk.Duration;
    }
  ): NodejsFunction {
    return new NodejsFunction(this, id, {
      description: options.description,
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.ARM_64,
      handler: 'handler',
      entry: path.join(BACKEND_DIR, options.entry),
      role: options.role,
      timeout: options.timeout ?? cdk.Duration.seconds(30),
      memorySize: 256,
      environment: options.environment,
      bundling: {
        minify: true,
        sourceMap: true,
        target: 'node20',
        forceDockerBundling: false,
      },
    });
  }
}
