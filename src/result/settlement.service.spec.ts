import { SettlementService } from './settlement.service';
import { ResultState } from './types/result.types';
import { MatchResult } from './entities/match-result.entity';
import { DeadlineService } from '../match/deadline.service';
import { GroupDirectoryService } from '../membership/group-directory.service';
import { PredictionService } from '../prediction/prediction.service';
import { PredictedWinner } from '../prediction/types/scoring.types';
import { SettlementState } from '../prediction/types/prediction.types';
import { deriveWinner } from '../prediction/helpers/prediction.helper';
import { LeaderboardService } from '../leaderboard/leaderboard.service';
import { ResultNotFinalError } from '../common/errors/betting.errors';
import { createLeagueFixture, createLeagueTestingModule, LeagueFixture } from '../../test/helpers/league-testing';

describe('SettlementService', () => {
  let fixture: LeagueFixture;
  let service: SettlementService;
  let leaderboardService: LeaderboardService;

  const seedResult = (state: ResultState, homeScore: number, awayScore: number): Promise<MatchResult> =>
    fixture.results.save(
      fixture.results.create({
        matchId: 'm2',
        homeScore,
        awayScore,
        winner: deriveWinner(homeScore, awayScore),
        state,
        enteredAt: fixture.clock.now(),
        finalizedAt: state === ResultState.FINAL ? fixture.clock.now() : null,
        enteredBy: 'admin-1',
        version: 0,
      }),
    );

  const pointsByUser = () =>
    Object.fromEntries(fixture.predictions.all().map((p) => [p.userId, p.points]));

  beforeEach(async () => {
    fixture = createLeagueFixture();
    const module = await createLeagueTestingModule(fixture);
    service = module.get<SettlementService>(SettlementService);
    leaderboardService = module.get<LeaderboardService>(LeaderboardService);
    const deadlines = module.get<DeadlineService>(DeadlineService);
    const directory = module.get<GroupDirectoryService>(GroupDirectoryService);
    const predictions = module.get<PredictionService>(PredictionService);

    await deadlines.upsertMatch({
      id: 'm1',
      groupId: 'g1',
      competitionId: 'c1',
      scheduledStart: new Date('2026-06-01T18:00:00.000Z'),
    });
    await deadlines.upsertMatch({
      id: 'm2',
      groupId: 'g1',
      competitionId: 'c1',
      scheduledStart: new Date('2026-06-02T18:00:00.000Z'),
    });

    const picks: Array<[string, PredictedWinner, number, number]> = [
      ['u1', PredictedWinner.HOME, 2, 1],
      ['u2', PredictedWinner.DRAW, 1, 1],
      ['u3', PredictedWinner.HOME, 1, 0],
    ];
    for (const [userId, predictedWinner, predictedHomeScore, predictedAwayScore] of picks) {
      await directory.upsertMembership('g1', userId, {});
      await predictions.placePrediction({
        userId,
        matchId: 'm2',
        groupId: 'g1',
        predictedWinner,
        predictedHomeScore,
        predictedAwayScore,
      });
    }
  });

  describe('settleMatch', () => {
    it('should refuse to settle without a final result', async () => {
      await expect(service.settleMatch('m2')).rejects.toThrow(ResultNotFinalError);

      await seedResult(ResultState.PROVISIONAL, 2, 1);
      await expect(service.settleMatch('m2')).rejects.toMatchObject({
        code: 'RESULT_NOT_FINAL',
        context: { matchId: 'm2', state: 'PROVISIONAL' },
      });
      expect(pointsByUser()).toEqual({ u1: null, u2: null, u3: null });
    });

    it('should score every prediction against the final result', async () => {
      const result = await seedResult(ResultState.FINAL, 2, 1);

      const summary = await service.settleMatch('m2');

      expect(summary).toEqual({
        matchId: 'm2',
        resultKey: `${result.id}:v0`,
        totalPredictions: 3,
        newlySettled: 3,
        alreadySettled: 0,
        voided: 0,
        exactScoreHits: 1,
        correctWinnerHits: 1,
        misses: 1,
        pointsAwarded: 4,
        groups: ['g1'],
      });
      expect(pointsByUser()).toEqual({ u1: 3, u2: 0, u3: 1 });
      expect(fixture.predictions.all().every((p) => p.settledResultKey === `${result.id}:v0`)).toBe(true);
    });

    it('should be a no-op when run again', async () => {
      await seedResult(ResultState.FINAL, 2, 1);
      await service.settleMatch('m2');
      const before = fixture.predictions.all();
      const standingsBefore = await leaderboardService.rank('g1');

      const again = await service.settleMatch('m2');

      expect(again.newlySettled).toBe(0);
      expect(again.alreadySettled).toBe(3);
      expect(again.pointsAwarded).toBe(0);
      expect(fixture.predictions.all()).toEqual(before);
      expect(await leaderboardService.rank('g1')).toEqual(standingsBefore);
      expect(fixture.rabbit.eventTypes()).toEqual(['leaderboard_changed']);
    });

    it('should settle each prediction once when runs overlap', async () => {
      await seedResult(ResultState.FINAL, 2, 1);

      const [first, second] = await Promise.all([service.settleMatch('m2'), service.settleMatch('m2')]);

      expect(first.newlySettled + second.newlySettled).toBe(3);
      expect(fixture.predictions.all().map((p) => p.version)).toEqual([1, 1, 1]);

      const standings = await leaderboardService.rank('g1');
      expect(standings.map((e) => [e.userId, e.totalPoints])).toEqual([
        ['u1', 3],
        ['u3', 1],
        ['u2', 0],
      ]);
    });

    it('should skip voided predictions', async () => {
      await seedResult(ResultState.FINAL, 2, 1);
      const [voided] = fixture.predictions.all();
      await fixture.predictions.update(
        { id: voided.id },
        { settlementState: SettlementState.VOID, points: 0 },
      );

      const summary = await service.settleMatch('m2');

      expect(summary.voided).toBe(1);
      expect(summary.newlySettled).toBe(2);
    });
  });

  describe('voidMatch', () => {
    it('should void settled predictions and drop them from the standings', async () => {
      await seedResult(ResultState.FINAL, 2, 1);
      await service.settleMatch('m2');

      const voided = await service.voidMatch('m2');

      expect(voided).toBe(3);
      expect(pointsByUser()).toEqual({ u1: 0, u2: 0, u3: 0 });
      expect(await leaderboardService.rank('g1')).toEqual([]);
      expect(await service.voidMatch('m2')).toBe(0);
    });
  });

  describe('findUnsettledFinalMatches', () => {
    it('should find final matches with pending predictions', async () => {
      await seedResult(ResultState.FINAL, 2, 1);
      expect(await service.findUnsettledFinalMatches()).toEqual(['m2']);

      await service.settleMatch('m2');
      expect(await service.findUnsettledFinalMatches()).toEqual([]);
    });
  });
});
