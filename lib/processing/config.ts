import { ConfigurationError } from './errors';

export interface TransformConfig {
  /** Fields removed from every event before it is written to the processed zone. */
  piiFields: string[],
  /** Field set to the processing time, overwriting any value the producer sent. */
  timestampField: string,
}

export interface PartitionConfig {
  rawPrefix: string,
  processedPrefix: string,
  rawSuffix: string,
  processedSuffix: string,
}

export interface PipelineConfig {
  transform: TransformConfig,
  partition: PartitionConfig,
  /** When unset the processed object is written back to the bucket the notification came from. */
  destinationBucket?: string,
}

export type Environment = Record<string, string | undefined>;

const DEFAULT_RAW_SUFFIX = '.gz';
const DEFAULT_PROCESSED_SUFFIX = '.json';

/**
 * Builds the pipeline configuration from the variables the processing construct sets on the function.
 * @param env Usually `process.env`.
 * @returns The validated configuration.
 */
export function loadConfig(env: Environment): PipelineConfig {
  const { RawPrefix, ProcessedPrefix, PiiFields, TimestampField, RawSuffix, ProcessedSuffix, DestinationBucket } = env;

  if (!RawPrefix || !ProcessedPrefix || !PiiFields || !TimestampField) {
    const missing = Object.entries({ RawPrefix, ProcessedPrefix, PiiFields, TimestampField })
      .filter(([, value]) => !value)
      .map(([name]) => name);
    throw new ConfigurationError(`Missing environment variables: ${missing.join(', ')}`);
  }

  const piiFields = PiiFields.split(',').map(f => f.trim()).filter(f => f.length > 0);
  if (piiFields.length === 0) {
    throw new ConfigurationError('PiiFields must name at least one field');
  }

  const timestampField = TimestampField.trim();
  if (piiFields.includes(timestampField)) {
    throw new ConfigurationError(`TimestampField '${timestampField}' is also listed in PiiFields`);
  }

  if (RawPrefix === ProcessedPrefix) {
    throw new ConfigurationError(`RawPrefix and ProcessedPrefix must differ, both are '${RawPrefix}'`);
  }

  return {
    transform: {
      piiFields,
      timestampField,
    },
    partition: {
      rawPrefix: RawPrefix,
      processedPrefix: ProcessedPrefix,
      rawSuffix: RawSuffix || DEFAULT_RAW_SUFFIX,
      processedSuffix: ProcessedSuffix || DEFAULT_PROCESSED_SUFFIX,
    },
    destinationBucket: DestinationBucket || undefined,
  };
}
