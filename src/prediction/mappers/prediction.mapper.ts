import { Prediction } from '../entities/prediction.entity';

export function toPredictionResponse(prediction: Prediction) {
  return {
    id: prediction.id,
    userId: prediction.userId,
    matchId: prediction.matchId,
    groupId: prediction.groupId,
    predictedWinner: prediction.predictedWinner,
    predictedHomeScore: prediction.predictedHomeScore,
    predictedAwayScore: prediction.predictedAwayScore,
    placedAt: prediction.placedAt,
    settlementState: prediction.settlementState,
    points: prediction.points,
    scoreRule: prediction.scoreRule,
  };
}
