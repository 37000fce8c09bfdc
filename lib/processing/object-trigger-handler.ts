import type { S3Event, S3EventRecord } from 'aws-lambda';
import { BatchProcessor, type BatchResult, type CompletedOutcome } from './batch-processor';
import type { PipelineConfig } from './config';
import { InvocationFailedError, type FailedObject } from './errors';
import { EventTransformer, type Clock } from './event-transformer';
import type { ObjectLocation, ObjectStore } from './object-store';
import { decodeNotificationKey, deriveProcessedKey } from './partition-path';

export const PROCESSED_CONTENT_TYPE = 'application/json';

/**
 * Where one raw object ended up. The happy path runs Received -> Reading -> Transforming -> Writing -> Done;
 * a failed read or decode stops in Fatal, a failed write in WriteFailed, and keys outside the raw zone
 * are Ignored before anything is read.
 */
export type ObjectResult =
  | { State: 'Done', Source: ObjectLocation, Destination: ObjectLocation, Outcome: CompletedOutcome }
  | { State: 'Ignored', Source: ObjectLocation, Reason: string }
  | { State: 'Fatal', Source: ObjectLocation, Reason: string }
  | { State: 'WriteFailed', Source: ObjectLocation, Destination: ObjectLocation, Reason: string };

export interface TriggerResult {
  Results: ObjectResult[],
}

function describe(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Entry point for S3 ObjectCreated notifications on the raw zone. Each record is read, transformed and
 * written to the processed zone as a full overwrite, so a redelivered notification just replaces the
 * earlier output.
 */
export class ObjectTriggerHandler {
  private readonly _config: PipelineConfig;
  private readonly _store: ObjectStore;
  private readonly _processor: BatchProcessor;

  constructor(config: PipelineConfig, store: ObjectStore, clock: Clock) {
    this._config = config;
    this._store = store;
    this._processor = new BatchProcessor(new EventTransformer(config.transform, clock));

    console.info('Initialised');
  }

  handler = async (event: S3Event): Promise<TriggerResult> => {
    console.info('Received Event:', JSON.stringify(event, null, 2));

    const results: ObjectResult[] = [];
    for (const record of event.Records ?? []) {
      results.push(await this.handleRecord(record));
    }

    const failures: FailedObject[] = [];
    for (const result of results) {
      if (result.State === 'Fatal' || result.State === 'WriteFailed') {
        failures.push({ ...result.Source, State: result.State, Reason: result.Reason });
      }
    }

    if (failures.length > 0) {
      throw new InvocationFailedError(failures);
    }

    return { Results: results };
  };

  handleRecord = async (record: S3EventRecord): Promise<ObjectResult> => {
    const bucket = record.s3.bucket.name;
    const key = decodeNotificationKey(record.s3.object.key);

    if (key === undefined) {
      console.warn('Ignoring object with undecodable key', bucket, record.s3.object.key);
      return { State: 'Ignored', Source: { Bucket: bucket, Key: record.s3.object.key }, Reason: 'Key is not valid URL encoding' };
    }

    const source: ObjectLocation = { Bucket: bucket, Key: key };
    const destinationKey = deriveProcessedKey(key, this._config.partition);

    if (destinationKey === undefined) {
      console.warn('Ignoring object outside the raw zone', bucket, key);
      return { State: 'Ignored', Source: source, Reason: `Key does not match ${this._config.partition.rawPrefix}*${this._config.partition.rawSuffix}` };
    }

    const destination: ObjectLocation = { Bucket: this._config.destinationBucket ?? bucket, Key: destinationKey };

    console.info('Reading', bucket, key);
    let body: Buffer;
    try {
      body = await this._store.get(source);
    } catch (error) {
      console.error('Failed reading object', bucket, key, error);
      return { State: 'Fatal', Source: source, Reason: describe(error) };
    }

    console.info('Transforming', bucket, key, body.length);
    let result: BatchResult;
    try {
      result = await this._processor.process(body);
    } catch (error) {
      console.error('Failed transforming object', bucket, key, error);
      return { State: 'Fatal', Source: source, Reason: describe(error) };
    }

    if (!('body' in result)) {
      console.error('Failed decoding object', bucket, key, result.outcome.reason);
      return { State: 'Fatal', Source: source, Reason: result.outcome.reason };
    }

    if (result.outcome.kind === 'PartialSuccess') {
      console.warn('Skipped records', key, JSON.stringify(result.outcome.skipReasons));
    }

    console.info('Writing', destination.Bucket, destination.Key, result.body.length);
    try {
      await this._store.put(destination, result.body, PROCESSED_CONTENT_TYPE);
    } catch (error) {
      console.error('Failed writing object', destination.Bucket, destination.Key, error);
      return { State: 'WriteFailed', Source: source, Destination: destination, Reason: describe(error) };
    }

    console.info('Processed object', key, JSON.stringify(result.outcome));
    return { State: 'Done', Source: source, Destination: destination, Outcome: result.outcome };
  };
}
