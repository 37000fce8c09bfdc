import type * as aws from 'aws-sdk';
import { StoreReadError, StoreWriteError, type StoreReadFailure, type StoreWriteFailure } from './errors';

export interface ObjectLocation {
  Bucket: string,
  Key: string,
}

/**
 * Whole-object access to the data lake. A put replaces whatever is at the location in one step.
 */
export interface ObjectStore {
  get(location: ObjectLocation): Promise<Buffer>;
  put(location: ObjectLocation, body: Buffer, contentType: string): Promise<void>;
}

const TRANSIENT_CODES = new Set([
  'InternalError',
  'ServiceUnavailable',
  'SlowDown',
  'RequestTimeout',
  'RequestTimeTooSkewed',
  'NetworkingError',
  'TimeoutError',
]);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function readFailure(error: unknown): StoreReadFailure {
  switch (errorCode(error)) {
    case 'NoSuchKey':
    case 'NotFound':
    case 'NoSuchBucket':
      return 'NotFound';
    case 'AccessDenied':
    case 'Forbidden':
      return 'AccessDenied';
    default:
      return 'Unknown';
  }
}

export function writeFailure(error: unknown): StoreWriteFailure {
  const code = errorCode(error);
  if (code === 'AccessDenied' || code === 'Forbidden') {
    return 'AccessDenied';
  }
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return 'Transient';
  }
  return 'Unknown';
}

/**
 * Converts the body types the SDK declares into a Buffer. In Node the SDK hands back a Buffer.
 */
export function toBuffer(body: aws.S3.Body | undefined): Buffer | undefined {
  if (body === undefined) {
    return undefined;
  }
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf-8');
  }
  return undefined;
}

/**
 * Object store backed by S3. Timeouts and retries are the SDK client's own settings.
 */
export class S3ObjectStore implements ObjectStore {
  private readonly _s3: aws.S3;

  constructor(s3: aws.S3) {
    this._s3 = s3;
  }

  get = async (location: ObjectLocation): Promise<Buffer> => {
    let response: aws.S3.GetObjectOutput;
    try {
      response = await this._s3.getObject({ Bucket: location.Bucket, Key: location.Key }).promise();
    } catch (error) {
      const reason = readFailure(error);
      throw new StoreReadError(reason, `Unable to read s3://${location.Bucket}/${location.Key}: ${reason}`, { cause: error });
    }

    const body = toBuffer(response.Body);
    if (body === undefined) {
      throw new StoreReadError('Unknown', `Unreadable body for s3://${location.Bucket}/${location.Key}`);
    }
    return body;
  };

  put = async (location: ObjectLocation, body: Buffer, contentType: string): Promise<void> => {
    try {
      await this._s3.putObject({
        Bucket: location.Bucket,
        Key: location.Key,
        Body: body,
        ContentType: contentType,
      }).promise();
    } catch (error) {
      const reason = writeFailure(error);
      throw new StoreWriteError(reason, `Unable to write s3://${location.Bucket}/${location.Key}: ${reason}`, { cause: error });
    }
  };
}
