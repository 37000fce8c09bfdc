import type * as firehose from 'aws-lambda/trigger/kinesis-firehose-transformation';

/**
 * Firehose concatenates records as they arrive, so each one has to carry its own newline for the raw objects
 * to be JSON lines. Records are not validated here; a malformed line is kept in the raw zone and skipped later.
 */
export class DelimitRecords {
  handler = async (event: firehose.FirehoseTransformationEvent): Promise<firehose.FirehoseTransformationResult> => {
    console.info('Received Event:', JSON.stringify({ invocationId: event.invocationId, records: event.records.length }));

    const records: firehose.FirehoseTransformationResultRecord[] = [];

    for (const record of event.records) {
      records.push(this.transformRecord(record));
    }

    return { records };
  };

  transformRecord = (record: firehose.FirehoseTransformationEventRecord): firehose.FirehoseTransformationResultRecord => {
    const payloadStr = Buffer.from(record.data, 'base64').toString('utf-8').trimEnd();

    if (payloadStr.length === 0) {
      console.warn('Dropping empty record', record.recordId);
      return {
        recordId: record.recordId,
        result: 'Dropped',
        data: '',
      };
    }

    return {
      recordId: record.recordId,
      result: 'Ok',
      data: Buffer.from(payloadStr + '\n', 'utf-8').toString('base64'),
    };
  };
}

// Initialise class outside of the handler so context is reused.
const delimitRecords = new DelimitRecords();

// The handler simply executes the object handler
export const handler = async (event: firehose.FirehoseTransformationEvent): Promise<firehose.FirehoseTransformationResult> => delimitRecords.handler(event);
