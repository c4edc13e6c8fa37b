import { ResultSweepService } from './result-sweep.service';
import { ResultService } from './result.service';
import { ResultState } from './types/result.types';
import { DeadlineService } from '../match/deadline.service';
import { PredictedWinner } from '../prediction/types/scoring.types';
import { SettlementState } from '../prediction/types/prediction.types';
import { createLeagueFixture, createLeagueTestingModule, LeagueFixture } from '../../test/helpers/league-testing';
import { HOUR } from '../../test/helpers/manual-clock';

describe('ResultSweepService', () => {
  let fixture: LeagueFixture;
  let sweep: ResultSweepService;
  let resultService: ResultService;

  beforeEach(async () => {
    fixture = createLeagueFixture();
    const module = await createLeagueTestingModule(fixture);
    sweep = module.get<ResultSweepService>(ResultSweepService);
    resultService = module.get<ResultService>(ResultService);

    await module.get<DeadlineService>(DeadlineService).upsertMatch({
      id: 'm1',
      groupId: 'g1',
      competitionId: 'c1',
      scheduledStart: new Date('2026-06-01T18:00:00.000Z'),
    });
  });

  it('should do nothing when every final result is settled', async () => {
    await expect(sweep.sweep()).resolves.toEqual({ resettledMatches: 0, overdueReported: 0 });
  });

  it('should finish an interrupted settlement', async () => {
    await fixture.results.save(
      fixture.results.create({
        matchId: 'm1',
        homeScore: 1,
        awayScore: 0,
        winner: PredictedWinner.HOME,
        state: ResultState.FINAL,
        enteredAt: fixture.clock.now(),
        finalizedAt: fixture.clock.now(),
        enteredBy: 'admin-1',
        version: 0,
      }),
    );
    await fixture.predictions.save(
      fixture.predictions.create({
        userId: 'u1',
        matchId: 'm1',
        groupId: 'g1',
        predictedWinner: PredictedWinner.HOME,
        predictedHomeScore: 1,
        predictedAwayScore: 0,
        placedAt: fixture.clock.now(),
        points: null,
        scoreRule: null,
        settlementState: SettlementState.PENDING,
        settledResultKey: null,
        settledAt: null,
        version: 0,
      }),
    );

    const report = await sweep.sweep();

    expect(report.resettledMatches).toBe(1);
    expect(fixture.predictions.all()[0].points).toBe(3);
  });

  it('should report a provisional result past the finalization window once', async () => {
    await resultService.recordProvisional('m1', 2, 2, 'admin-1');
    fixture.clock.advance(49 * HOUR);

    const first = await sweep.sweep();
    const second = await sweep.sweep();

    expect(first.overdueReported).toBe(1);
    expect(second.overdueReported).toBe(0);

    const overdue = fixture.rabbit.events().filter((e) => e.type === 'finalization_overdue');
    expect(overdue).toEqual([
      {
        type: 'finalization_overdue',
        matchId: 'm1',
        groupId: 'g1',
        enteredAt: '2026-06-01T12:00:00.000Z',
      },
    ]);
  });

  it('should not report a provisional result inside the window', async () => {
    await resultService.recordProvisional('m1', 2, 2, 'admin-1');
    fixture.clock.advance(47 * HOUR);

    await expect(sweep.sweep()).resolves.toEqual({ resettledMatches: 0, overdueReported: 0 });
  });

  it('should report an overdue result again after a failed notification', async () => {
    await resultService.recordProvisional('m1', 2, 2, 'admin-1');
    fixture.clock.advance(49 * HOUR);
    fixture.rabbit.failWith = new Error('broker unavailable');

    const failed = await sweep.sweep();
    fixture.rabbit.failWith = null;
    const retried = await sweep.sweep();

    expect(failed.overdueReported).toBe(0);
    expect(retried.overdueReported).toBe(1);
    expect(fixture.rabbit.eventTypes()).toEqual(['provisional_result_posted', 'finalization_overdue']);
  });

  it('should report a corrected result once it is overdue again', async () => {
    await resultService.recordProvisional('m1', 2, 2, 'admin-1');
    fixture.clock.advance(49 * HOUR);
    await sweep.sweep();

    await resultService.recordProvisional('m1', 3, 2, 'admin-1');
    const corrected = await sweep.sweep();
    fixture.clock.advance(49 * HOUR);
    const overdueAgain = await sweep.sweep();

    expect(corrected.overdueReported).toBe(0);
    expect(overdueAgain.overdueReported).toBe(1);
  });

  it('should not report a provisional result of a cancelled match', async () => {
    await resultService.recordProvisional('m1', 2, 2, 'admin-1');
    await resultService.cancelMatch('m1', 'admin-1');
    fixture.clock.advance(49 * HOUR);

    await expect(sweep.sweep()).resolves.toEqual({ resettledMatches: 0, overdueReported: 0 });
  });
});
