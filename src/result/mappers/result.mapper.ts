import { MatchResult } from '../entities/match-result.entity';

export function toResultResponse(result: MatchResult) {
  return {
    matchId: result.matchId,
    state: result.state,
    homeScore: result.homeScore,
    awayScore: result.awayScore,
    winner: result.winner,
    enteredAt: result.enteredAt,
    finalizedAt: result.finalizedAt,
  };
}
