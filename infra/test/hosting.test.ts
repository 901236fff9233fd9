import { Template, Match } from 'aws-cdk-lib/assertions';
import { createTestStack } from './helpers';

/**
 * Test to verify the hosting bucket is private.
 * It is only reachable through CloudFront with Origin Access Control.
 */
test('S3 Hosting Bucket has PublicAccessBlock enabled', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::S3::Bucket', {
    PublicAccessBlockConfiguration: {
      BlockPublicAcls: true,
      BlockPublicPolicy: true,
      IgnorePublicAcls: true,
      RestrictPublicBuckets: true,
    },
  });
});

/**
 * The uploads bucket is referenced by name, so the hosting bucket is the
 * only bucket this stack creates.
 */
test('Stack creates no bucket other than the hosting bucket', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.resourceCountIs('AWS::S3::Bucket', 1);
});

test('CloudFront Distribution serves index.html over HTTPS', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::CloudFront::Distribution', {
    DistributionConfig: {
      Enabled: true,
      DefaultRootObject: 'index.html',
      DefaultCacheBehavior: Match.objectLike({
        ViewerProtocolPolicy: 'redirect-to-https',
      }),
    },
  });
});

test('CloudFront Distribution has Origin Access Control configured', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::CloudFront::OriginAccessControl', {
    OriginAccessControlConfig: Match.objectLike({
      OriginAccessControlOriginType: 's3',
      SigningBehavior: 'always',
      SigningProtocol: 'sigv4',
    }),
  });
});

test('Dashboard build is deployed and the distribution invalidated', () => {
  // GIVEN
  const stack = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('Custom::CDKBucketDeployment', {
    Prune: true,
    DistributionPaths: ['/*'],
  });
});
