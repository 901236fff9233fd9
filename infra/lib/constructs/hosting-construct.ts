import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as origins from 'aws-cdk-lib/aws-cloudfront-origins';
import * as s3deploy from 'aws-cdk-lib/aws-s3-deployment';

export interface HostingConstructProps {
  /** Directory holding the built dashboard (`frontend/dist`) */
  readonly frontendDistPath: string;
}

/**
 * HostingConstruct
 *
 * Serves the built dashboard from a private bucket through CloudFront.
 * The bucket is only reachable through the distribution's Origin Access Control.
 */
export class HostingConstruct extends Construct {
  public readonly hostingBucket: s3.Bucket;
  public readonly distribution: cloudfront.Distribution;
  public readonly bucketDeployment: s3deploy.BucketDeployment;

  constructor(scope: Construct, id: string, props: HostingConstructProps) {
    super(scope, id);

    this.hostingBucket = new s3.Bucket(this, 'HostingBucket', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
    });

    const originAccessControl = new cloudfront.S3OriginAccessControl(this, 'OAC', {
      description: 'Origin Access Control for the dashboard bucket',
    });

    this.distribution = new cloudfront.Distribution(this, 'Distribution', {
      defaultBehavior: {
        origin: origins.S3BucketOrigin.withOriginAccessControl(this.hostingBucket, {
          originAccessControl,
        }),
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        cachePolicy: cloudfront.CachePolicy.CACHING_OPTIMIZED,
      },
      defaultRootObject: 'index.html',
    });

    // Invalidate everything so a redeploy is visible immediately
    this.bucketDeployment = new s3deploy.BucketDeployment(this, 'DeployDashboard', {
      sources: [s3deploy.Source.asset(props.frontendDistPath)],
      destinationBucket: this.hostingBucket,
      distribution: this.distribution,
      distributionPaths: ['/*'],
      prune: true,
    });
  }
}
