import { ArgumentsHost, HttpStatus } from '@nestjs/common';
import { BettingExceptionFilter, httpStatusFor } from './betting-exception.filter';
import {
  DeadlinePassedError,
  InvalidPredictionError,
  MatchNotFoundError,
  NotGroupMemberError,
  ScoringInvariantError,
} from '../errors/betting.errors';

describe('BettingExceptionFilter', () => {
  let filter: BettingExceptionFilter;
  let response: { status: jest.Mock; json: jest.Mock };
  let host: ArgumentsHost;

  beforeEach(() => {
    filter = new BettingExceptionFilter();
    response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
    host = {
      switchToHttp: () => ({ getResponse: () => response }),
    } as unknown as ArgumentsHost;
  });

  it('should answer a passed deadline with 409 and its context', () => {
    filter.catch(
      new DeadlinePassedError('Match m1 no longer accepts predictions', {
        matchId: 'm1',
        state: 'NEXT_LOCKED',
      }),
      host,
    );

    expect(response.status).toHaveBeenCalledWith(HttpStatus.CONFLICT);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 409,
      error: 'DEADLINE_PASSED',
      message: 'Match m1 no longer accepts predictions',
      context: { matchId: 'm1', state: 'NEXT_LOCKED' },
    });
  });

  it('should hide the details of an internal scoring fault', () => {
    filter.catch(new ScoringInvariantError('Result winner contradicts its scores', { matchId: 'm1' }), host);

    expect(response.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(response.json).toHaveBeenCalledWith({ statusCode: 500, error: 'SCORING_INVARIANT_VIOLATION' });
  });

  it('should map validation, membership and lookup failures', () => {
    expect(httpStatusFor(new InvalidPredictionError('bad pick'))).toBe(HttpStatus.BAD_REQUEST);
    expect(httpStatusFor(new NotGroupMemberError('not a member'))).toBe(HttpStatus.FORBIDDEN);
    expect(httpStatusFor(new MatchNotFoundError('missing'))).toBe(HttpStatus.NOT_FOUND);
  });
});
