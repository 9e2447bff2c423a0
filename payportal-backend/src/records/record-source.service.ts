import { Injectable, Logger } from '@nestjs/common';
import { GetObjectCommand, GetObjectCommandOutput } from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { ConfigService } from '../config/config.service';
import { AwsService } from '../config/aws.service';
import { RecordFile } from './sheet-parser';
import { RecordSourceError } from './record-source.error';
import { withTimeout } from './with-timeout.util';

/**
 * Fetches the raw trip-payments export from a local file or an S3 object.
 * Every fetch is bounded by RECORDS_FETCH_TIMEOUT_MS, aborted when the limit
 * passes, and never retried.
 */
@Injectable()
export class RecordSourceService {
  private readonly logger = new Logger(RecordSourceService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly awsService: AwsService,
  ) {}

  describe(): string {
    const filePath = this.configService.recordsFilePath;
    if (filePath) {
      return `file://${filePath}`;
    }
    const bucket = this.configService.recordsBucketName;
    const key = this.configService.recordsObjectKey;
    return bucket && key ? `s3://${bucket}/${key}` : 'unconfigured';
  }

  async fetch(): Promise<RecordFile> {
    const timeoutMs = this.configService.recordsFetchTimeoutMs;
    const filePath = this.configService.recordsFilePath;

    if (filePath) {
      return withTimeout(signal => this.readLocalFile(filePath, signal), timeoutMs, `Reading ${filePath}`);
    }

    const bucket = this.configService.recordsBucketName;
    const key = this.configService.recordsObjectKey;
    if (!bucket || !key) {
      throw new RecordSourceError(
        'Record source is not configured: set RECORDS_FILE_PATH, or RECORDS_BUCKET_NAME and RECORDS_OBJECT_KEY',
      );
    }

    return withTimeout(
      signal => this.downloadObject(bucket, key, signal),
      timeoutMs,
      `Downloading s3://${bucket}/${key}`,
    );
  }

  private async readLocalFile(filePath: string, signal: AbortSignal): Promise<RecordFile> {
    try {
      const contents = await readFile(filePath, { signal });
      return { name: basename(filePath), contents };
    } catch (error) {
      throw new RecordSourceError(`Could not read ${filePath}`, { cause: error });
    }
  }

  private async downloadObject(bucket: string, key: string, signal: AbortSignal): Promise<RecordFile> {
    this.logger.debug(`Downloading s3://${bucket}/${key}`);

    let response: GetObjectCommandOutput;
    try {
      response = await this.awsService.getS3Client().send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
        { abortSignal: signal },
      );
    } catch (error) {
      throw new RecordSourceError(`Could not download s3://${bucket}/${key}`, { cause: error });
    }

    if (!response.Body) {
      throw new RecordSourceError(`Object s3://${bucket}/${key} has no content`);
    }

    return { name: key, contents: await response.Body.transformToByteArray() };
  }
}
