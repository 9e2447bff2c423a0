import { Test, TestingModule } from '@nestjs/testing';
import { GetObjectCommand } from '@aws-sdk/client-s3';
import { join } from 'path';
import { RecordSourceService } from '../../../src/records/record-source.service';
import { RecordSourceError } from '../../../src/records/record-source.error';
import { ConfigService } from '../../../src/config/config.service';
import { AwsService } from '../../../src/config/aws.service';

describe('RecordSourceService', () => {
  let service: RecordSourceService;

  const fixturePath = join(__dirname, '..', '..', 'fixtures', 'trip-payments.csv');

  const mockConfigService = {
    recordsFilePath: '',
    recordsBucketName: '',
    recordsObjectKey: '',
    recordsFetchTimeoutMs: 1000,
  };

  const mockS3Client = {
    send: jest.fn(),
  };

  const mockAwsService = {
    getS3Client: jest.fn().mockReturnValue(mockS3Client),
  };

  beforeEach(async () => {
    Object.assign(mockConfigService, {
      recordsFilePath: '',
      recordsBucketName: '',
      recordsObjectKey: '',
      recordsFetchTimeoutMs: 1000,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RecordSourceService,
        {
          provide: ConfigService,
          useValue: mockConfigService,
        },
        {
          provide: AwsService,
          useValue: mockAwsService,
        },
      ],
    }).compile();

    service = module.get<RecordSourceService>(RecordSourceService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('describe', () => {
    it('should report an unconfigured source', () => {
      expect(service.describe()).toBe('unconfigured');
    });

    it('should describe the S3 object', () => {
      mockConfigService.recordsBucketName = 'payments-bucket';
      mockConfigService.recordsObjectKey = 'exports/trips.csv';

      expect(service.describe()).toBe('s3://payments-bucket/exports/trips.csv');
    });

    it('should prefer the local file', () => {
      mockConfigService.recordsFilePath = '/data/trips.csv';
      mockConfigService.recordsBucketName = 'payments-bucket';
      mockConfigService.recordsObjectKey = 'exports/trips.csv';

      expect(service.describe()).toBe('file:///data/trips.csv');
    });
  });

  describe('fetch', () => {
    it('should fail when no source is configured', async () => {
      await expect(service.fetch()).rejects.toThrow(RecordSourceError);
      expect(mockS3Client.send).not.toHaveBeenCalled();
    });

    it('should read the local file', async () => {
      mockConfigService.recordsFilePath = fixturePath;

      const file = await service.fetch();

      expect(file.name).toBe('trip-payments.csv');
      expect(Buffer.from(file.contents).toString('utf8').startsWith('trip_id,driver_num,')).toBe(true);
    });

    it('should fail on a missing local file', async () => {
      mockConfigService.recordsFilePath = join(__dirname, 'missing.csv');

      await expect(service.fetch()).rejects.toThrow(`Could not read ${mockConfigService.recordsFilePath}`);
    });

    describe('from S3', () => {
      beforeEach(() => {
        mockConfigService.recordsBucketName = 'payments-bucket';
        mockConfigService.recordsObjectKey = 'exports/trips.csv';
      });

      it('should download the object', async () => {
        mockS3Client.send.mockResolvedValue({
          Body: { transformToByteArray: jest.fn().mockResolvedValue(new Uint8Array([116, 114, 105, 112])) },
        });

        const file = await service.fetch();

        expect(file).toEqual({ name: 'exports/trips.csv', contents: new Uint8Array([116, 114, 105, 112]) });
        expect(mockS3Client.send).toHaveBeenCalledWith(expect.any(GetObjectCommand), {
          abortSignal: expect.any(AbortSignal),
        });
        expect(mockS3Client.send.mock.calls[0][0].input).toEqual({
          Bucket: 'payments-bucket',
          Key: 'exports/trips.csv',
        });
      });

      it('should wrap S3 errors', async () => {
        mockS3Client.send.mockRejectedValue(new Error('AccessDenied'));

        await expect(service.fetch()).rejects.toThrow('Could not download s3://payments-bucket/exports/trips.csv');
      });

      it('should fail on an empty object', async () => {
        mockS3Client.send.mockResolvedValue({});

        await expect(service.fetch()).rejects.toThrow('Object s3://payments-bucket/exports/trips.csv has no content');
      });

      it('should give up after the fetch timeout', async () => {
        mockConfigService.recordsFetchTimeoutMs = 10;
        mockS3Client.send.mockReturnValue(new Promise(() => undefined));

        await expect(service.fetch()).rejects.toThrow(
          'Downloading s3://payments-bucket/exports/trips.csv timed out after 10ms',
        );
      });

      it('should abort the download once the fetch timeout passes', async () => {
        mockConfigService.recordsFetchTimeoutMs = 10;
        mockS3Client.send.mockReturnValue(new Promise(() => undefined));

        await expect(service.fetch()).rejects.toThrow(RecordSourceError);

        const [, options] = mockS3Client.send.mock.calls[0];
        expect(options.abortSignal.aborted).toBe(true);
      });
    });
  });
});
