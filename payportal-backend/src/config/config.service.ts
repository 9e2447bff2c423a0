import { Injectable } from '@nestjs/common';

@Injectable()
export class ConfigService {
  get awsRegion(): string {
    return process.env.AWS_REGION || 'us-east-1';
  }

  get recordsBucketName(): string {
    return process.env.RECORDS_BUCKET_NAME || '';
  }

  get recordsObjectKey(): string {
    return process.env.RECORDS_OBJECT_KEY || '';
  }

  /**
   * Local CSV/XLSX export; takes precedence over the S3 object when set
   */
  get recordsFilePath(): string {
    return process.env.RECORDS_FILE_PATH || '';
  }

  /**
   * Worksheet holding the records in an XLSX workbook; the first sheet when empty
   */
  get recordsSheetName(): string {
    return process.env.RECORDS_SHEET_NAME || '';
  }

  get recordsCacheTtlSeconds(): number {
    return this.numberFromEnv('RECORDS_CACHE_TTL_SECONDS', 600);
  }

  get recordsFetchTimeoutMs(): number {
    return this.numberFromEnv('RECORDS_FETCH_TIMEOUT_MS', 15000);
  }

  get portalGenericAuthErrors(): boolean {
    return process.env.PORTAL_GENERIC_AUTH_ERRORS === 'true';
  }

  // 0 keeps driver sessions open until logout
  get portalSessionTtlMinutes(): number {
    return this.numberFromEnv('PORTAL_SESSION_TTL_MINUTES', 0);
  }

  get allowedOrigins(): string {
    return process.env.ALLOWED_ORIGINS || '*';
  }

  get port(): number {
    return this.numberFromEnv('PORT', 3000);
  }

  get nodeEnv(): string {
    return process.env.NODE_ENV || 'development';
  }

  private numberFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = Number(raw);
    return Number.isFinite(value) && value >= 0 ? value : fallback;
  }
}
