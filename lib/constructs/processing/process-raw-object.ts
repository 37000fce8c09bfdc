import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdanode from 'aws-cdk-lib/aws-lambda-nodejs';
import * as destinations from 'aws-cdk-lib/aws-lambda-destinations';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as sqs from 'aws-cdk-lib/aws-sqs';

export interface ProcessRawObjectConstructProps {
  bucket: s3.IBucket,
  rawPrefix: string,
  processedPrefix: string,
  piiFields: string[],
  timestampField: string,
}

/**
 * Construct for the lambda (and associated role) that turns each raw Firehose object into a processed JSON lines
 * object. Invocations that still fail after the async retries land in a dead letter queue.
 */
export default class ProcessRawObjectConstruct extends Construct {

  public readonly lambda : lambda.IFunction;

  public readonly deadLetterQueue: sqs.IQueue;

  constructor(scope: Construct, id: string, props: ProcessRawObjectConstructProps) {
    super(scope, id);

    const role = new iam.Role(this, 'LambdaRole', {
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
    });
    role.addManagedPolicy(iam.ManagedPolicy.fromAwsManagedPolicyName("service-role/AWSLambdaBasicExecutionRole"));
    role.addToPolicy(
      new iam.PolicyStatement({
        resources: [props.bucket.arnForObjects(`${props.rawPrefix}*`)],
        actions: ['s3:GetObject'],
      }),
    );
    role.addToPolicy(
      new iam.PolicyStatement({
        resources: [props.bucket.arnForObjects(`${props.processedPrefix}*`)],
        actions: ['s3:PutObject'],
      }),
    );

    this.deadLetterQueue = new sqs.Queue(this, 'DeadLetterQueue', {
      retentionPeriod: cdk.Duration.days(14),
      enforceSSL: true,
    });

    this.lambda = new lambdanode.NodejsFunction(this, 'lambda', {
      entry: path.join(__dirname, 'process-raw-object.lambda.ts'),
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 512,
      timeout: cdk.Duration.minutes(5),
      retryAttempts: 2,
      onFailure: new destinations.SqsDestination(this.deadLetterQueue),
      environment: {
        RawPrefix: props.rawPrefix,
        ProcessedPrefix: props.processedPrefix,
        PiiFields: props.piiFields.join(','),
        TimestampField: props.timestampField,
        NODE_OPTIONS: '--enable-source-maps',
      },
      bundling: {
        minify: true,
        sourceMap: true,
      },
      role,
    });
  }
}
