import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as s3n from 'aws-cdk-lib/aws-s3-notifications';
import * as glue from '@aws-cdk/aws-glue-alpha';
import * as firehose_alpha from '@aws-cdk/aws-kinesisfirehose-alpha';
import * as firehosedestinations from '@aws-cdk/aws-kinesisfirehose-destinations-alpha';
import DelimitRecordsConstruct from '../constructs/ingestion/delimit-records';
import ProcessRawObjectConstruct from '../constructs/processing/process-raw-object';

export interface ClickstreamStackProps extends cdk.StackProps {
  rawPrefix?: string,
  processedPrefix?: string,
  piiFields?: string[],
  timestampField?: string,
}

export const RAW_SUFFIX = '.gz';

/**
 * Stack for the clickstream data lake: Firehose lands compressed raw events, a lambda rewrites each new raw object
 * into the processed zone, and Glue describes the processed zone for Athena.
 */
export class ClickstreamStack extends cdk.Stack {

  public readonly dataLakeBucket: s3.IBucket;

  public readonly deliveryStream: firehose_alpha.IDeliveryStream;

  constructor(scope: Construct, id: string, props: ClickstreamStackProps = {}) {
    super(scope, id, props);

    const rawPrefix = props.rawPrefix ?? 'raw/';
    const processedPrefix = props.processedPrefix ?? 'processed/';

    const dataLakeBucket = new s3.Bucket(this, 'DataLake', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
    });
    this.dataLakeBucket = dataLakeBucket;

    this.deliveryStream = this.createDeliveryStream(dataLakeBucket, rawPrefix);

    const processRawObject = new ProcessRawObjectConstruct(this, 'ProcessRawObject', {
      bucket: dataLakeBucket,
      rawPrefix,
      processedPrefix,
      piiFields: props.piiFields ?? ['user_id'],
      timestampField: props.timestampField ?? 'processed_ts',
    });

    // Only compressed objects under the raw zone, otherwise the processed writes would trigger the lambda again
    dataLakeBucket.addEventNotification(
      s3.EventType.OBJECT_CREATED,
      new s3n.LambdaDestination(processRawObject.lambda),
      { prefix: rawPrefix, suffix: RAW_SUFFIX },
    );

    const database = new glue.Database(this, 'ClickstreamDataLake', {
      databaseName: 'clickstream_data_lake',
    });

    this.createGlueTableForProcessedEvents(database, dataLakeBucket, processedPrefix);
  }

  /**
   * Firehose writes GZIP objects partitioned by arrival date. The delimiter lambda puts each record on its own line.
   * @param dataLakeBucket The bucket holding both zones.
   * @param rawPrefix Prefix of the raw zone, the partition path is appended to it.
   */
  private createDeliveryStream(dataLakeBucket: s3.IBucket, rawPrefix: string): firehose_alpha.IDeliveryStream {
    const delimitRecords = new DelimitRecordsConstruct(this, 'DelimitRecords');

    const processor = new firehose_alpha.LambdaFunctionProcessor(delimitRecords.lambda, {
      bufferInterval: cdk.Duration.seconds(60),
      bufferSize: cdk.Size.mebibytes(1),
      retries: 1,
    });

    return new firehose_alpha.DeliveryStream(this, 'DeliveryStream', {
      destinations: [new firehosedestinations.S3Bucket(dataLakeBucket, {
        bufferingInterval: cdk.Duration.seconds(60),
        compression: firehosedestinations.Compression.GZIP,
        dataOutputPrefix: `${rawPrefix}year=!{timestamp:yyyy}/month=!{timestamp:MM}/day=!{timestamp:dd}/`,
        errorOutputPrefix: 'errors/!{firehose:error-output-type}/year=!{timestamp:yyyy}/month=!{timestamp:MM}/day=!{timestamp:dd}/',
        processor,
      })],
    });
  }

  /**
   * Create a Glue table over the processed zone. The schema is known so it is declared rather than crawled; extra
   * fields the producer sends stay in the objects and are ignored by the JSON SerDe.
   * @param database The Glue DB to add the table to.
   * @param dataLakeBucket The Bucket containing the data, to create the table for.
   * @param processedPrefix Prefix of the processed zone inside the bucket.
   */
  private createGlueTableForProcessedEvents(database: glue.Database, dataLakeBucket: s3.IBucket, processedPrefix: string) {
    new glue.S3Table(this, 'ProcessedEventsTable', {
      database,
      tableName: 'processed_events',
      bucket: dataLakeBucket,
      s3Prefix: processedPrefix,
      columns: [
        { name: 'event_id', type: glue.Schema.STRING },
        { name: 'page_url', type: glue.Schema.STRING },
        { name: 'event_type', type: glue.Schema.STRING },
        { name: 'event_ts', type: glue.Schema.STRING },
        { name: 'processed_ts', type: glue.Schema.STRING },
      ],
      partitionKeys: [
        { name: 'year', type: glue.Schema.STRING },
        { name: 'month', type: glue.Schema.STRING },
        { name: 'day', type: glue.Schema.STRING },
      ],
      dataFormat: glue.DataFormat.JSON,
    });
  }
}
