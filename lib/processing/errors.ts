/**
 * Base class for every failure the pipeline raises itself.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised at container start when the environment does not describe a usable pipeline.
 */
export class ConfigurationError extends PipelineError {}

/**
 * The raw object could not be decompressed, so none of its lines can be trusted.
 */
export class CodecError extends PipelineError {}

export type StoreReadFailure = 'NotFound' | 'AccessDenied' | 'Unknown';

export type StoreWriteFailure = 'AccessDenied' | 'Transient' | 'Unknown';

export class StoreReadError extends PipelineError {
  public readonly reason: StoreReadFailure;

  constructor(reason: StoreReadFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.reason = reason;
  }
}

export class StoreWriteError extends PipelineError {
  public readonly reason: StoreWriteFailure;

  constructor(reason: StoreWriteFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.reason = reason;
  }
}

export interface FailedObject {
  Bucket: string,
  Key: string,
  State: 'Fatal' | 'WriteFailed',
  Reason: string,
}

/**
 * Thrown from the Lambda handler so the async invocation is retried and, once retries are spent,
 * sent to the on-failure destination.
 */
export class InvocationFailedError extends PipelineError {
  public readonly failures: FailedObject[];

  constructor(failures: FailedObject[]) {
    super(`Failed to process ${failures.length} object(s): ${failures.map(f => `s3://${f.Bucket}/${f.Key} (${f.Reason})`).join(', ')}`);
    this.failures = failures;
  }
}
