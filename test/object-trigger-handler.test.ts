import { gzipSync } from 'zlib';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { PipelineConfig } from '../lib/processing/config';
import { InvocationFailedError, StoreWriteError } from '../lib/processing/errors';
import { ObjectTriggerHandler, PROCESSED_CONTENT_TYPE } from '../lib/processing/object-trigger-handler';
import { MemoryObjectStore } from './support/memory-object-store';
import { s3Event, s3Record } from './support/s3-event';

const BUCKET = 'clickstream-lake';
const RAW_KEY = 'raw/year=2025/month=11/day=26/f.gz';
const PROCESSED_KEY = 'processed/year=2025/month=11/day=26/f.json';
const NOW = '2025-11-26T10:15:30.000Z';

const config: PipelineConfig = {
  transform: { piiFields: ['user_id'], timestampField: 'processed_ts' },
  partition: { rawPrefix: 'raw/', processedPrefix: 'processed/', rawSuffix: '.gz', processedSuffix: '.json' },
};

function rawObject(lines: string[]): Buffer {
  return gzipSync(lines.join('\n') + '\n');
}

describe('ObjectTriggerHandler', () => {
  let store: MemoryObjectStore;
  let handler: ObjectTriggerHandler;

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    store = new MemoryObjectStore();
    handler = new ObjectTriggerHandler(config, store, () => new Date(NOW));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes the transformed object to the mirrored processed key', async () => {
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject([
      '{"event_id":"e1","user_id":"u1","event_type":"view"}',
      '{"event_id":"e2","event_type":"click"}',
    ]));

    const result = await handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)));

    expect(result).toEqual({
      Results: [{
        State: 'Done',
        Source: { Bucket: BUCKET, Key: RAW_KEY },
        Destination: { Bucket: BUCKET, Key: PROCESSED_KEY },
        Outcome: { kind: 'Success', transformed: 2 },
      }],
    });
    expect(store.puts).toHaveLength(1);
    expect(store.puts[0].contentType).toBe(PROCESSED_CONTENT_TYPE);
    expect(store.read({ Bucket: BUCKET, Key: PROCESSED_KEY })).toBe(
      `{"event_id":"e1","event_type":"view","processed_ts":"${NOW}"}\n{"event_id":"e2","event_type":"click","processed_ts":"${NOW}"}`,
    );
  });

  it('reports skipped lines without failing the invocation', async () => {
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject(['{"event_id":"e1"}', '{oops', '{"event_id":"e2"}']));

    const result = await handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)));

    expect(result.Results[0]).toMatchObject({
      State: 'Done',
      Outcome: { kind: 'PartialSuccess', transformed: 2, skipped: 1 },
    });
    expect(store.read({ Bucket: BUCKET, Key: PROCESSED_KEY })?.split('\n')).toHaveLength(2);
  });

  it('writes an empty processed object for an empty raw object', async () => {
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, gzipSync(''));

    const result = await handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)));

    expect(result.Results[0]).toMatchObject({ State: 'Done', Outcome: { kind: 'Success', transformed: 0 } });
    expect(store.read({ Bucket: BUCKET, Key: PROCESSED_KEY })).toBe('');
  });

  it('fails without writing when the raw object is not compressed', async () => {
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, Buffer.from('{"event_id":"e1"}\n'));

    await expect(handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)))).rejects.toBeInstanceOf(InvocationFailedError);
    expect(store.puts).toHaveLength(0);
  });

  it('fails without writing when the raw object is missing', async () => {
    await expect(handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)))).rejects.toMatchObject({
      failures: [{ Bucket: BUCKET, Key: RAW_KEY, State: 'Fatal', Reason: `StoreReadError: Unable to read s3://${BUCKET}/${RAW_KEY}: NotFound` }],
    });
    expect(store.puts).toHaveLength(0);
  });

  it('fails when the processed object cannot be written', async () => {
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject(['{"event_id":"e1"}']));
    store.writeError = new StoreWriteError('AccessDenied', 'denied');

    await expect(handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)))).rejects.toMatchObject({
      failures: [{ Bucket: BUCKET, Key: RAW_KEY, State: 'WriteFailed', Reason: 'StoreWriteError: denied' }],
    });
  });

  it('ignores keys outside the raw zone', async () => {
    const result = await handler.handler(s3Event(s3Record(BUCKET, 'processed/year=2025/month=11/day=26/f.json')));

    expect(result.Results).toEqual([{
      State: 'Ignored',
      Source: { Bucket: BUCKET, Key: 'processed/year=2025/month=11/day=26/f.json' },
      Reason: 'Key does not match raw/*.gz',
    }]);
    expect(store.gets).toHaveLength(0);
    expect(store.puts).toHaveLength(0);
  });

  it('decodes URL encoded keys from the notification', async () => {
    store.seed({ Bucket: BUCKET, Key: 'raw/year=2025/month=11/day=26/my file.gz' }, rawObject(['{"event_id":"e1"}']));

    await handler.handler(s3Event(s3Record(BUCKET, 'raw/year%3D2025/month%3D11/day%3D26/my+file.gz')));

    expect(store.puts.map(p => p.location)).toEqual([{ Bucket: BUCKET, Key: 'processed/year=2025/month=11/day=26/my file.json' }]);
  });

  it('handles every record before failing the invocation', async () => {
    const goodKey = 'raw/year=2025/month=11/day=27/g.gz';
    store.seed({ Bucket: BUCKET, Key: goodKey }, rawObject(['{"event_id":"e1"}']));

    const invocation = handler.handler(s3Event(s3Record(BUCKET, RAW_KEY), s3Record(BUCKET, goodKey)));

    await expect(invocation).rejects.toMatchObject({ failures: [{ Key: RAW_KEY, State: 'Fatal' }] });
    expect(store.puts.map(p => p.location.Key)).toEqual(['processed/year=2025/month=11/day=27/g.json']);
  });

  it('writes the other objects when one holds a line nested too deeply to rewrite', async () => {
    const depth = 200_000;
    const goodKey = 'raw/year=2025/month=11/day=27/g.gz';
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject(['{"event_id":"e1"}', `{"a":${'['.repeat(depth)}${']'.repeat(depth)}}`]));
    store.seed({ Bucket: BUCKET, Key: goodKey }, rawObject(['{"event_id":"e2"}']));

    const result = await handler.handler(s3Event(s3Record(BUCKET, RAW_KEY), s3Record(BUCKET, goodKey)));

    expect(result.Results.map(r => r.State)).toEqual(['Done', 'Done']);
    expect(result.Results[0]).toMatchObject({ Outcome: { kind: 'PartialSuccess', transformed: 1, skipped: 1 } });
    expect(store.puts.map(p => p.location.Key)).toEqual([PROCESSED_KEY, 'processed/year=2025/month=11/day=27/g.json']);
  });

  it('reports an unexpected transform failure for that object and carries on', async () => {
    const goodKey = 'raw/year=2025/month=11/day=27/g.gz';
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject(['{"event_id":"e1"}']));
    store.seed({ Bucket: BUCKET, Key: goodKey }, rawObject(['{"event_id":"e2"}']));
    handler = new ObjectTriggerHandler(config, store, () => {
      throw new Error('clock unavailable');
    });

    await expect(handler.handler(s3Event(s3Record(BUCKET, RAW_KEY), s3Record(BUCKET, goodKey)))).rejects.toMatchObject({
      failures: [
        { Key: RAW_KEY, State: 'Fatal', Reason: 'Error: clock unavailable' },
        { Key: goodKey, State: 'Fatal', Reason: 'Error: clock unavailable' },
      ],
    });
    expect(store.gets.map(g => g.Key)).toEqual([RAW_KEY, goodKey]);
    expect(store.puts).toHaveLength(0);
  });

  it('writes to the configured destination bucket', async () => {
    handler = new ObjectTriggerHandler({ ...config, destinationBucket: 'processed-lake' }, store, () => new Date(NOW));
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject(['{"event_id":"e1"}']));

    await handler.handler(s3Event(s3Record(BUCKET, RAW_KEY)));

    expect(store.puts.map(p => p.location)).toEqual([{ Bucket: 'processed-lake', Key: PROCESSED_KEY }]);
  });

  it('overwrites the processed object when a notification is redelivered', async () => {
    store.seed({ Bucket: BUCKET, Key: RAW_KEY }, rawObject(['{"event_id":"e1","user_id":"u1"}']));
    const event = s3Event(s3Record(BUCKET, RAW_KEY));

    await handler.handler(event);
    await new ObjectTriggerHandler(config, store, () => new Date('2025-11-26T12:00:00.000Z')).handler(event);

    expect(store.puts).toHaveLength(2);
    expect(store.read({ Bucket: BUCKET, Key: PROCESSED_KEY })).toBe('{"event_id":"e1","processed_ts":"2025-11-26T12:00:00.000Z"}');
  });

  it('returns no results for a notification without records', async () => {
    expect(await handler.handler({ Records: [] })).toEqual({ Results: [] });
  });
});
