import { Match } from '../entities/match.entity';
import { LockEvaluation } from '../types/deadline.types';

export function toMatchResponse(match: Match) {
  return {
    id: match.id,
    groupId: match.groupId,
    competitionId: match.competitionId,
    homeSide: match.homeSide,
    awaySide: match.awaySide,
    scheduledStart: match.scheduledStart,
    deadline: match.deadline,
    deadlineOverridden: match.deadlineOverridden,
    deadlineLocked: match.deadlineLocked,
    status: match.status,
  };
}

export function toLockStateResponse(matchId: string, evaluation: LockEvaluation) {
  return {
    matchId,
    state: evaluation.state,
    deadline: evaluation.deadline,
    isNext: evaluation.isNext,
  };
}
