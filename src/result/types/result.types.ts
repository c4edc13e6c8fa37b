export enum ResultState {
  PROVISIONAL = 'PROVISIONAL',
  FINAL = 'FINAL',
}

export interface SettlementSummary {
  matchId: string;
  resultKey: string;
  totalPredictions: number;
  newlySettled: number;
  alreadySettled: number;
  voided: number;
  exactScoreHits: number;
  correctWinnerHits: number;
  misses: number;
  pointsAwarded: number;
  groups: string[];
}
