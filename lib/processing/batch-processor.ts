import { decode, encode } from './codec';
import { CodecError } from './errors';
import type { EventTransformer, SkipReason } from './event-transformer';

export type SkipCounts = Partial<Record<SkipReason, number>>;

export type Outcome =
  | { kind: 'Success', transformed: number }
  | { kind: 'PartialSuccess', transformed: number, skipped: number, skipReasons: SkipCounts }
  | { kind: 'Fatal', reason: string };

export type CompletedOutcome = Extract<Outcome, { kind: 'Success' | 'PartialSuccess' }>;

export type BatchResult =
  | { outcome: CompletedOutcome, body: Buffer }
  | { outcome: Extract<Outcome, { kind: 'Fatal' }> };

/**
 * Runs a whole raw object through the codec and transformer, keeping the input line order.
 */
export class BatchProcessor {
  private readonly _transformer: EventTransformer;

  constructor(transformer: EventTransformer) {
    this._transformer = transformer;
  }

  process = async (bytes: Buffer): Promise<BatchResult> => {
    const lines: string[] = [];
    const skipReasons: SkipCounts = {};
    let skipped = 0;

    try {
      for await (const rawLine of decode(bytes)) {
        const result = this._transformer.transform(rawLine);
        if (result.kind === 'transformed') {
          lines.push(result.line);
        } else {
          skipped++;
          skipReasons[result.reason] = (skipReasons[result.reason] ?? 0) + 1;
        }
      }
    } catch (error) {
      if (error instanceof CodecError) {
        return { outcome: { kind: 'Fatal', reason: `codec-error: ${error.message}` } };
      }
      throw error;
    }

    const body = encode(lines);

    if (skipped === 0) {
      return { outcome: { kind: 'Success', transformed: lines.length }, body };
    }

    return { outcome: { kind: 'PartialSuccess', transformed: lines.length, skipped, skipReasons }, body };
  };
}
