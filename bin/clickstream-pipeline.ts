#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { ClickstreamStack } from '../lib/stacks/clickstream-stack';

const app = new cdk.App();

// Read from context, defaults match the Glue table and the Firehose prefixes
const piiFields = app.node.tryGetContext('piiFields');

new ClickstreamStack(app, 'ClickstreamStack', {
  piiFields: typeof piiFields === 'string' ? piiFields.split(',') : undefined,
});
