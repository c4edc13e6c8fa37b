import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThan, Repository } from 'typeorm';
import { AuditRecord } from './entities/audit-record.entity';
import { AuditEntry, AuditKind } from './types/audit.types';
import { Clock, CLOCK } from '../common/clock/clock';

/**
 * Append-only record of administrative deadline and result mutations.
 * Every record is persisted and echoed to the application log.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);
  private readonly isProduction: boolean;
  private readonly pageSize: number;

  constructor(
    @InjectRepository(AuditRecord)
    private auditRepository: Repository<AuditRecord>,
    private configService: ConfigService,
    @Inject(CLOCK) private clock: Clock,
  ) {
    this.isProduction = this.configService.get<string>('nodeEnv') === 'production';
    this.pageSize = this.configService.get<number>('audit.historyPageSize') || 100;
  }

  /**
   * Persists an audit entry. There is intentionally no update or delete counterpart.
   */
  async record(entry: AuditEntry): Promise<AuditRecord> {
    const record = this.auditRepository.create({
      actorId: entry.actorId,
      kind: entry.kind,
      entityId: entry.entityId,
      beforeValue: entry.before,
      afterValue: entry.after,
      recordedAt: this.clock.now(),
    });

    const saved = await this.auditRepository.save(record);
    this.log(saved);
    return saved;
  }

  /**
   * Audit trail of one entity, oldest first.
   *
   * The returned iterable reads lazily page by page, keyed on the insertion
   * sequence, so records appended mid-read land after the ones already seen.
   * Iterating it again starts a fresh read from the beginning.
   */
  history(entityId: string): AsyncIterable<AuditRecord> {
    const repository = this.auditRepository;
    const pageSize = this.pageSize;

    return {
      async *[Symbol.asyncIterator]() {
        let after = 0;

        for (;;) {
          const page = await repository.find({
            where: { entityId, sequence: MoreThan(after) },
            order: { sequence: 'ASC' },
            take: pageSize,
          });

          yield* page;

          if (page.length < pageSize) return;
          after = page[page.length - 1].sequence;
        }
      },
    };
  }

  /**
   * Collects up to `limit` records of an entity's history.
   */
  async collectHistory(entityId: string, limit: number): Promise<AuditRecord[]> {
    const records: AuditRecord[] = [];

    for await (const record of this.history(entityId)) {
      records.push(record);
      if (records.length >= limit) break;
    }

    return records;
  }

  private log(record: AuditRecord): void {
    const logData = {
      recordedAt: record.recordedAt.toISOString(),
      kind: record.kind,
      entityId: record.entityId,
      actorId: record.actorId,
      before: record.beforeValue,
      after: record.afterValue,
    };

    if (this.isProduction) {
      this.logger.log(JSON.stringify(logData));
    } else {
      this.logger.log(`[AUDIT] ${record.kind}`, logData);
    }

    if (record.kind === AuditKind.RESULT_CORRECTION) {
      this.logger.warn(`[AUDIT] result for ${record.entityId} corrected by ${record.actorId}`);
    }
  }
}
