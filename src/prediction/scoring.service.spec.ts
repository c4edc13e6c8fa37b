import { Test, TestingModule } from '@nestjs/testing';
import { ScoringService } from './scoring.service';
import { PredictedWinner, Scoreline, SCORING_POINTS } from './types/scoring.types';
import { ScoringInvariantError } from '../common/errors/betting.errors';

const line = (winner: PredictedWinner, homeScore: number, awayScore: number): Scoreline => ({
  winner,
  homeScore,
  awayScore,
});

describe('ScoringService', () => {
  let service: ScoringService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ScoringService,
        {
          provide: SCORING_POINTS,
          useValue: { exactScore: 3, correctWinner: 1, miss: 0 },
        },
      ],
    }).compile();

    service = module.get<ScoringService>(ScoringService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('Rule 1: Exact score (3 points)', () => {
    it('should return 3 points for an exact home win', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.HOME, 2, 1),
        line(PredictedWinner.HOME, 2, 1),
      );

      expect(result.score).toBe(3);
      expect(result.rule).toBe('EXACT_SCORE');
      expect(result.details).toEqual({
        description: 'Exact score',
        predicted: 'HOME 2-1',
        actual: 'HOME 2-1',
      });
    });

    it('should return 3 points for an exact away win', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.AWAY, 0, 2),
        line(PredictedWinner.AWAY, 0, 2),
      );

      expect(result.score).toBe(3);
      expect(result.rule).toBe('EXACT_SCORE');
    });

    it('should return 3 points for an exact draw', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.DRAW, 1, 1),
        line(PredictedWinner.DRAW, 1, 1),
      );

      expect(result.score).toBe(3);
    });
  });

  describe('Rule 2: Correct winner (1 point)', () => {
    it('should return 1 point when the winner matches but the score does not', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.HOME, 2, 0),
        line(PredictedWinner.HOME, 1, 0),
      );

      expect(result.score).toBe(1);
      expect(result.rule).toBe('CORRECT_WINNER');
      expect(result.details.description).toBe('Correct winner, different score');
    });

    it('should treat a different draw scoreline as a correct winner', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.DRAW, 0, 0),
        line(PredictedWinner.DRAW, 2, 2),
      );

      expect(result.score).toBe(1);
      expect(result.rule).toBe('CORRECT_WINNER');
    });
  });

  describe('Rule 3: Miss (0 points)', () => {
    it('should return 0 points for a drawn pick on a home win', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.DRAW, 1, 1),
        line(PredictedWinner.HOME, 2, 1),
      );

      expect(result.score).toBe(0);
      expect(result.rule).toBe('MISS');
      expect(result.details).toEqual({
        description: 'Wrong winner',
        predicted: 'DRAW 1-1',
        actual: 'HOME 2-1',
      });
    });

    it('should return 0 points when the winner is reversed', () => {
      const result = service.scorePrediction(
        line(PredictedWinner.AWAY, 1, 2),
        line(PredictedWinner.HOME, 2, 1),
      );

      expect(result.score).toBe(0);
      expect(result.rule).toBe('MISS');
    });
  });

  describe('Corrupt outcomes', () => {
    it('should reject an outcome whose winner contradicts its scores', () => {
      expect(() =>
        service.scorePrediction(line(PredictedWinner.HOME, 2, 1), line(PredictedWinner.DRAW, 2, 1)),
      ).toThrow(ScoringInvariantError);
    });

    it('should reject an outcome with a negative score', () => {
      expect(() =>
        service.scorePrediction(line(PredictedWinner.HOME, 2, 1), line(PredictedWinner.AWAY, -1, 0)),
      ).toThrow(ScoringInvariantError);
    });
  });

  describe('Configured points', () => {
    it('should award the configured values', async () => {
      const module: TestingModule = await Test.createTestingModule({
        providers: [
          ScoringService,
          { provide: SCORING_POINTS, useValue: { exactScore: 5, correctWinner: 2, miss: 0 } },
        ],
      }).compile();
      const custom = module.get<ScoringService>(ScoringService);

      expect(
        custom.scorePrediction(line(PredictedWinner.HOME, 3, 0), line(PredictedWinner.HOME, 3, 0)).score,
      ).toBe(5);
      expect(
        custom.scorePrediction(line(PredictedWinner.HOME, 1, 0), line(PredictedWinner.HOME, 3, 0)).score,
      ).toBe(2);
      expect(custom.getPoints()).toEqual({ exactScore: 5, correctWinner: 2, miss: 0 });
    });
  });
});
