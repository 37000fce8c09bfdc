import * as path from 'path';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdanode from 'aws-cdk-lib/aws-lambda-nodejs';

/**
 * Construct for a lambda that Firehose runs over each buffer so every clickstream record lands on its own line.
 */
export default class DelimitRecordsConstruct extends Construct {

  public readonly lambda : lambda.IFunction;

  constructor(scope: Construct, id: string) {
    super(scope, id);

    this.lambda = new lambdanode.NodejsFunction(this, 'lambda', {
      entry: path.join(__dirname, 'delimit-records.lambda.ts'),
      runtime: lambda.Runtime.NODEJS_20_X,
      environment: {
        NODE_OPTIONS: '--enable-source-maps',
      },
      bundling: {
        minify: true,
        sourceMap: true,
      },
    });
  }
}
