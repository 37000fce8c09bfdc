import type { PartitionConfig } from './config';

/**
 * Decodes an object key as it appears in an S3 event notification, where spaces arrive as `+`.
 * @returns undefined when the key is not valid percent-encoding.
 */
export function decodeNotificationKey(key: string): string | undefined {
  try {
    return decodeURIComponent(key.replace(/\+/g, ' '));
  } catch {
    return undefined;
  }
}

/**
 * Maps `raw/year=YYYY/month=MM/day=DD/<name>.gz` to `processed/year=YYYY/month=MM/day=DD/<name>.json`.
 * The partition segments are copied as they are so both zones share partition values, whatever the clock
 * says at processing time.
 * @returns undefined for keys outside the raw zone or without the compressed suffix.
 */
export function deriveProcessedKey(rawKey: string, config: PartitionConfig): string | undefined {
  if (!rawKey.startsWith(config.rawPrefix) || !rawKey.endsWith(config.rawSuffix)) {
    return undefined;
  }

  const rest = rawKey.slice(config.rawPrefix.length, rawKey.length - config.rawSuffix.length);
  if (rest.length === 0) {
    return undefined;
  }

  return `${config.processedPrefix}${rest}${config.processedSuffix}`;
}
