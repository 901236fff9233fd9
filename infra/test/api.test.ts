import { Template, Match } from 'aws-cdk-lib/assertions';
import { createTestStack } from './helpers';

/**
 * Test to verify HTTP API Gateway is created.
 */
test('HTTP API Gateway is created', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::ApiGatewayV2::Api', {
    Name: 'DeepfakeDetectionDashboardApi',
    ProtocolType: 'HTTP',
  });
});

/**
 * The dashboard submits with POST and deletes with DELETE, so both must
 * pass the browser's preflight check.
 */
test('HTTP API allows GET, POST and DELETE from any origin', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::ApiGatewayV2::Api', {
    CorsConfiguration: {
      AllowOrigins: ['*'],
      AllowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      AllowHeaders: ['Content-Type'],
    },
  });
});

test.each([
  'POST /detections',
  'GET /uploads',
  'DELETE /uploads/{key+}',
  'GET /detections/export',
])('HTTP API has %s route configured', routeKey => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::ApiGatewayV2::Route', {
    RouteKey: routeKey,
  });
});

test('HTTP API has exactly four routes', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.resourceCountIs('AWS::ApiGatewayV2::Route', 4);
});

test.each([
  'SubmitDetectionFunction',
  'ListUploadsFunction',
  'DeleteUploadFunction',
  'ExportDetectionsFunction',
])('%s can be invoked by API Gateway', functionId => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  const permissions = template.findResources('AWS::Lambda::Permission', {
    Properties: {
      Action: 'lambda:InvokeFunction',
      Principal: 'apigateway.amazonaws.com',
      FunctionName: Match.objectLike({
        'Fn::GetAtt': Match.arrayWith([
          Match.stringLikeRegexp(functionId),
        ]),
      }),
    },
  });
  expect(Object.keys(permissions).length).toBeGreaterThan(0);
});

test('Storage functions are configured with the bucket and uploads prefix', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  const functions = template.findResources('AWS::Lambda::Function', {
    Properties: {
      Environment: {
        Variables: {
          BUCKET_NAME: 'test-uploads-bucket',
          UPLOADS_PREFIX: 'uploads/',
        },
      },
    },
  });
  expect(Object.keys(functions)).toHaveLength(2);
});

test('Export function reads the detection table', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Lambda::Function', {
    Description: 'Exports all detection records as CSV',
    Environment: {
      Variables: {
        TABLE_NAME: 'TestDetections',
      },
    },
  });
});

test('Submit function calls the configured detection endpoint', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Lambda::Function', {
    Description: 'Relays an image URL to the deepfake detection service',
    Timeout: 60,
    Environment: {
      Variables: {
        DETECTION_API_URL: 'https://detector.example.com/detect',
      },
    },
  });
});

test('Dashboard functions run on Node.js 20 with ARM64', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  const functions = template.findResources('AWS::Lambda::Function', {
    Properties: {
      Runtime: 'nodejs20.x',
      Architectures: ['arm64'],
      Handler: 'index.handler',
    },
  });
  expect(Object.keys(functions)).toHaveLength(4);
});
