import { AuditService } from './audit.service';
import { AuditKind } from './types/audit.types';
import {
  createLeagueFixture,
  createLeagueTestingModule,
  LeagueFixture,
  TEST_START,
} from '../../test/helpers/league-testing';
import { MINUTE } from '../../test/helpers/manual-clock';

describe('AuditService', () => {
  let fixture: LeagueFixture;
  let service: AuditService;

  beforeEach(async () => {
    fixture = createLeagueFixture({ 'audit.historyPageSize': 2 });
    const module = await createLeagueTestingModule(fixture);
    service = module.get<AuditService>(AuditService);

    for (let i = 1; i <= 5; i++) {
      await service.record({
        actorId: 'admin-1',
        kind: AuditKind.DEADLINE_OVERRIDE,
        entityId: 'm1',
        before: { step: i - 1 },
        after: { step: i },
      });
      fixture.clock.advance(MINUTE);
    }
    await service.record({
      actorId: 'admin-2',
      kind: AuditKind.MATCH_CANCELLED,
      entityId: 'm2',
      before: { status: 'SCHEDULED' },
      after: { status: 'CANCELLED' },
    });
  });

  it('should stamp records with the clock', async () => {
    const [first] = await service.collectHistory('m1', 1);

    expect(first.recordedAt).toEqual(new Date('2026-06-01T12:00:00.000Z'));
    expect(first.beforeValue).toEqual({ step: 0 });
    expect(first.afterValue).toEqual({ step: 1 });
  });

  it('should read the history of one entity oldest first, page by page', async () => {
    const find = jest.spyOn(fixture.auditRecords, 'find');

    const records = await service.collectHistory('m1', 100);

    expect(records.map((r) => r.afterValue)).toEqual([
      { step: 1 },
      { step: 2 },
      { step: 3 },
      { step: 4 },
      { step: 5 },
    ]);
    expect(find).toHaveBeenCalledTimes(3);
  });

  it('should stop reading once the limit is reached', async () => {
    const find = jest.spyOn(fixture.auditRecords, 'find');

    const records = await service.collectHistory('m1', 3);

    expect(records).toHaveLength(3);
    expect(find).toHaveBeenCalledTimes(2);
  });

  it('should neither repeat nor skip records appended during a read', async () => {
    const seen: unknown[] = [];

    for await (const record of service.history('m1')) {
      seen.push(record.afterValue);
      if (seen.length === 1) {
        fixture.clock.set(TEST_START);
        await service.record({
          actorId: 'admin-1',
          kind: AuditKind.DEADLINE_OVERRIDE,
          entityId: 'm1',
          before: { step: 5 },
          after: { step: 6 },
        });
      }
    }

    expect(seen).toEqual([{ step: 1 }, { step: 2 }, { step: 3 }, { step: 4 }, { step: 5 }, { step: 6 }]);
  });

  it('should number records in insertion order', async () => {
    const records = await service.collectHistory('m1', 100);

    expect(records.map((r) => r.sequence)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should restart from the beginning on every iteration', async () => {
    const history = service.history('m2');
    const firstPass: string[] = [];
    const secondPass: string[] = [];

    for await (const record of history) firstPass.push(record.actorId);
    for await (const record of history) secondPass.push(record.actorId);

    expect(firstPass).toEqual(['admin-2']);
    expect(secondPass).toEqual(['admin-2']);
  });
});
