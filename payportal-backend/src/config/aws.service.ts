import { Injectable } from '@nestjs/common';
import { S3Client } from '@aws-sdk/client-s3';
import { ConfigService } from './config.service';

@Injectable()
export class AwsService {
  private readonly s3Client: S3Client;

  constructor(private readonly configService: ConfigService) {
    // Credentials come from the default provider chain
    // (AWS_PROFILE, AWS_ACCESS_KEY_ID/AWS_SECRET_ACCESS_KEY, ~/.aws/credentials, instance role)
    this.s3Client = new S3Client({ region: this.configService.awsRegion });
  }

  getS3Client(): S3Client {
    return this.s3Client;
  }
}
