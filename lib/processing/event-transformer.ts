import { TextDecoder } from 'util';
import { LosslessNumber, parse, stringify } from 'lossless-json';
import type { TransformConfig } from './config';

/**
 * A clickstream event as the producer sent it. Only the PII and timestamp fields are special cased,
 * everything else passes through untouched. Numbers are held as `LosslessNumber` so ids wider than a
 * double keep every digit.
 */
export type RawEvent = Record<string, unknown>;

/** A raw event minus its PII fields, plus the processing timestamp. */
export type ProcessedEvent = Record<string, unknown>;

export type Clock = () => Date;

export type SkipReason = 'malformed-json' | 'not-an-object' | 'unserialisable';

export type TransformResult =
  | { kind: 'transformed', line: string }
  | { kind: 'skipped', reason: SkipReason };

export function isRawEvent(value: unknown): value is RawEvent {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof LosslessNumber);
}

/**
 * Rewrites single JSON lines for the processed zone.
 */
export class EventTransformer {
  private readonly _piiFields: ReadonlySet<string>;
  private readonly _timestampField: string;
  private readonly _clock: Clock;
  private readonly _decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(config: TransformConfig, clock: Clock) {
    this._piiFields = new Set(config.piiFields);
    this._timestampField = config.timestampField;
    this._clock = clock;
  }

  /**
   * Decodes, parses, strips and stamps one line. A line that cannot be used is skipped rather than thrown,
   * so one bad record never costs the rest of the batch.
   * @param rawLine One trimmed line of the decompressed raw object.
   */
  transform = (rawLine: Uint8Array): TransformResult => {
    let parsed: unknown;
    try {
      parsed = parse(this._decoder.decode(rawLine));
    } catch (error) {
      // Valid but too deeply nested for the parser's recursion
      if (error instanceof RangeError) {
        return { kind: 'skipped', reason: 'unserialisable' };
      }
      return { kind: 'skipped', reason: 'malformed-json' };
    }

    if (!isRawEvent(parsed)) {
      return { kind: 'skipped', reason: 'not-an-object' };
    }

    const processed = this.transformEvent(parsed);

    let line: string | undefined;
    try {
      line = stringify(processed);
    } catch (error) {
      if (error instanceof RangeError) {
        return { kind: 'skipped', reason: 'unserialisable' };
      }
      throw error;
    }

    if (line === undefined) {
      return { kind: 'skipped', reason: 'unserialisable' };
    }

    return { kind: 'transformed', line };
  };

  transformEvent = (event: RawEvent): ProcessedEvent => {
    const processed: ProcessedEvent = Object.fromEntries(
      Object.entries(event).filter(([key]) => !this._piiFields.has(key)),
    );
    processed[this._timestampField] = this._clock().toISOString();
    return processed;
  };
}
