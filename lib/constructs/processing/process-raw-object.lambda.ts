import * as aws from 'aws-sdk';
import type { S3Event } from 'aws-lambda';
import { loadConfig } from '../../processing/config';
import { ObjectTriggerHandler, type TriggerResult } from '../../processing/object-trigger-handler';
import { S3ObjectStore } from '../../processing/object-store';

// Initialise class outside of the handler so context is reused, and so bad configuration fails the cold start.
const processRawObject = new ObjectTriggerHandler(
  loadConfig(process.env),
  new S3ObjectStore(new aws.S3()),
  () => new Date(),
);

// The handler simply executes the object handler
export const handler = async (event: S3Event): Promise<TriggerResult> => processRawObject.handler(event);
