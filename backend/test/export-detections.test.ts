import { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import { mockClient } from 'aws-sdk-client-mock';
import { DynamoDBDocumentClient, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { createHandler } from '../export-detections';

/**
 * Unit Tests for ExportDetections Lambda Function
 *
 * These tests validate the Lambda handler's ability to:
 * 1. Scan the detections table with a single Scan call
 * 2. Reformat epoch-second timestamps and serialize every record as CSV
 * 3. Answer 204 for an empty table
 * 4. Abort the whole export with 422 on a bad timestamp
 * 5. Handle DynamoDB errors and missing configuration with a 500
 */

const dynamoDbMock = mockClient(DynamoDBDocumentClient);

let consoleLogSpy: jest.SpyInstance;
let consoleErrorSpy: jest.SpyInstance;

const createApiEvent = (): APIGatewayProxyEventV2 => ({
  version: '2.0',
  routeKey: 'GET /detections/export',
  rawPath: '/detections/export',
  rawQueryString: '',
  headers: {},
  requestContext: {
    accountId: '123456789012',
    apiId: 'test-api-id',
    domainName: 'test-api.execute-api.us-east-2.amazonaws.com',
    domainPrefix: 'test-api',
    http: {
      method: 'GET',
      path: '/detections/export',
      protocol: 'HTTP/1.1',
      sourceIp: '127.0.0.1',
      userAgent: 'test-agent',
    },
    requestId: 'test-request-id',
    routeKey: 'GET /detections/export',
    stage: '$default',
    time: '01/Jan/2024:00:00:00 +0000',
    timeEpoch: 1704067200000,
  },
  isBase64Encoded: false,
});

const createMockContext = (): Context => ({
  callbackWaitsForEmptyEventLoop: false,
  functionName: 'test-export-function',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:us-east-2:123456789012:function:test-export-function',
  memoryLimitInMB: '256',
  awsRequestId: 'test-request-id',
  logGroupName: '/aws/lambda/test-export-function',
  logStreamName: '2024/01/01/[$LATEST]test-stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => {},
  fail: () => {},
  succeed: () => {},
});

const sampleRecords = [
  {
    detectionId: 'det-1',
    file_url: 'https://example.com/a.jpg',
    verdict: 'fake',
    confidence: 0.97,
    timestamp: 1700000000,
  },
  {
    detectionId: 'det-2',
    file_url: 'https://example.com/b.jpg',
    verdict: 'real',
    confidence: 0.12,
    timestamp: 1704067200,
    notes: 'reviewed, ok',
  },
];

describe('ExportDetections Lambda Handler', () => {
  beforeEach(() => {
    dynamoDbMock.reset();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    process.env.TABLE_NAME = 'test-table';
    process.env.AWS_REGION = 'us-east-2';
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    delete process.env.TABLE_NAME;
    delete process.env.AWS_REGION;
  });

  test('should export every record as CSV with reformatted timestamps', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({ Items: sampleRecords, Count: 2 });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(200);
    expect(response.headers).toEqual({
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': 'attachment; filename="deepfake_detections.csv"',
      'Access-Control-Allow-Origin': '*',
    });
    expect(response.body).toBe(
      'detectionId,file_url,verdict,confidence,timestamp,notes\n' +
      'det-1,https://example.com/a.jpg,fake,0.97,2023-11-14 22:13:20,\n' +
      'det-2,https://example.com/b.jpg,real,0.12,2024-01-01 00:00:00,"reviewed, ok"\n'
    );
    expect(consoleLogSpy).toHaveBeenCalledWith('Exported 2 detection records');
  });

  test('should contain one header row plus one row per record', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({ Items: sampleRecords });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    const lines = (response.body as string).split('\n').filter(line => line !== '');
    expect(lines).toHaveLength(sampleRecords.length + 1);
  });

  test('should scan the configured table exactly once', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({
      Items: [sampleRecords[0]],
      LastEvaluatedKey: { detectionId: 'det-1' },
    });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(200);
    expect(dynamoDbMock.calls()).toHaveLength(1);
    expect(dynamoDbMock.call(0).args[0].input).toEqual({ TableName: 'test-table' });
  });

  test('should accept timestamps stored as integer strings', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({
      Items: [{ detectionId: 'det-3', timestamp: '1700000000' }],
    });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.body).toBe('detectionId,timestamp\ndet-3,2023-11-14 22:13:20\n');
  });

  test('should return 204 without a body when the table is empty', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({ Items: [], Count: 0 });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(204);
    expect(response.headers).toEqual({ 'Access-Control-Allow-Origin': '*' });
    expect(response.body).toBeUndefined();
  });

  test('should return 204 when the scan returns no Items field', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({});
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(204);
  });

  test('should abort the export with 422 when a record has no timestamp', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({
      Items: [sampleRecords[0], { detectionId: 'det-9', verdict: 'fake' }],
    });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(422);
    expect(JSON.parse(response.body as string)).toEqual({
      error: 'Unprocessable entity',
      message: 'Record 1 has an invalid timestamp: missing',
    });
  });

  test('should abort the export with 422 when a timestamp is not numeric', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({
      Items: [{ detectionId: 'det-8', timestamp: 'yesterday' }],
    });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(422);
    expect(JSON.parse(response.body as string).message).toBe(
      'Record 0 has an invalid timestamp: "yesterday"'
    );
  });

  test('should abort the export with 422 when a timestamp is outside the Date range', async () => {
    // GIVEN
    dynamoDbMock.on(ScanCommand).resolves({
      Items: [
        { detectionId: 'det-1', timestamp: 1700000000 },
        { detectionId: 'det-9', timestamp: 1e17 },
      ],
    });
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(422);
    expect(JSON.parse(response.body as string)).toEqual({
      error: 'Unprocessable entity',
      message: 'Record 1 has an invalid timestamp: 100000000000000000',
    });
  });

  test('should return 500 when the scan fails', async () => {
    // GIVEN
    const error = new Error('ResourceNotFoundException: Requested resource not found');
    dynamoDbMock.on(ScanCommand).rejects(error);
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body as string)).toEqual({
      error: 'Internal server error',
      message: 'Failed to export detection records',
    });
    expect(consoleErrorSpy).toHaveBeenCalledWith('Failed to export detection records:', error);
  });

  test('should return 500 when TABLE_NAME environment variable is not set', async () => {
    // GIVEN
    delete process.env.TABLE_NAME;
    const handler = createHandler();

    // WHEN
    const response = await handler(createApiEvent(), createMockContext());

    // THEN
    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body as string)).toEqual({
      error: 'Internal server error',
      message: 'TABLE_NAME environment variable is not set',
    });
    expect(dynamoDbMock.calls()).toHaveLength(0);
  });
});
