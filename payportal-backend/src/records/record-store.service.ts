import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { cleanTripRecords, TripRecord } from '@payportal/shared';
import { ConfigService } from '../config/config.service';
import { RecordSourceService } from './record-source.service';
import { parseTripSheet } from './sheet-parser';

export const SYSTEM_UNAVAILABLE_MESSAGE = 'System unavailable. Please try again later.';

export interface RecordSnapshot {
  records: readonly TripRecord[];
  loadedAt: Date;
  source: string;
}

export interface RecordStoreStatus {
  loaded: boolean;
  recordCount: number;
  loadedAt: string | null;
  source: string;
  cacheTtlSeconds: number;
}

/**
 * In-memory table of cleaned trip records.
 *
 * The table is rebuilt wholesale once the cache interval has passed and the
 * new snapshot replaces the old one in a single assignment, so readers always
 * see one complete table. Callers arriving during a reload share that load.
 */
@Injectable()
export class RecordStoreService {
  private readonly logger = new Logger(RecordStoreService.name);
  private snapshot: RecordSnapshot | null = null;
  private pendingLoad: Promise<RecordSnapshot> | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly recordSource: RecordSourceService,
  ) {}

  async getRecords(): Promise<readonly TripRecord[]> {
    const snapshot = await this.getSnapshot();
    return snapshot.records;
  }

  async getSnapshot(): Promise<RecordSnapshot> {
    if (this.snapshot && this.isFresh(this.snapshot)) {
      return this.snapshot;
    }
    return this.refresh();
  }

  /**
   * Reloads the table now, regardless of the cache interval.
   * A failed reload leaves the previous snapshot in place.
   */
  refresh(): Promise<RecordSnapshot> {
    if (!this.pendingLoad) {
      this.pendingLoad = this.load().finally(() => {
        this.pendingLoad = null;
      });
    }
    return this.pendingLoad;
  }

  getStatus(): RecordStoreStatus {
    return {
      loaded: this.snapshot !== null,
      recordCount: this.snapshot?.records.length ?? 0,
      loadedAt: this.snapshot?.loadedAt.toISOString() ?? null,
      source: this.snapshot?.source ?? this.recordSource.describe(),
      cacheTtlSeconds: this.configService.recordsCacheTtlSeconds,
    };
  }

  private isFresh(snapshot: RecordSnapshot): boolean {
    const ttlMs = this.configService.recordsCacheTtlSeconds * 1000;
    return Date.now() - snapshot.loadedAt.getTime() < ttlMs;
  }

  private async load(): Promise<RecordSnapshot> {
    const startedAt = Date.now();

    try {
      const file = await this.recordSource.fetch();
      const rows = parseTripSheet(file, this.configService.recordsSheetName);
      const snapshot: RecordSnapshot = {
        records: Object.freeze(cleanTripRecords(rows)),
        loadedAt: new Date(),
        source: this.recordSource.describe(),
      };

      this.snapshot = snapshot;
      this.logger.log(
        `Loaded ${snapshot.records.length} trip records from ${snapshot.source} in ${Date.now() - startedAt}ms`,
      );
      return snapshot;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to load trip records: ${reason}`, error instanceof Error ? error.stack : undefined);
      throw new ServiceUnavailableException(SYSTEM_UNAVAILABLE_MESSAGE);
    }
  }
}
