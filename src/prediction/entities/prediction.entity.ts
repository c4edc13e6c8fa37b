import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { PredictedWinner, ScoreRule } from '../types/scoring.types';
import { SettlementState } from '../types/prediction.types';

@Entity('predictions')
@Index('uq_predictions_user_match_group', ['userId', 'matchId', 'groupId'], { unique: true })
@Index('idx_predictions_match', ['matchId'])
@Index('idx_predictions_group_state', ['groupId', 'settlementState'])
export class Prediction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'varchar', length: 64 })
  userId!: string;

  @Column({ name: 'match_id', type: 'varchar', length: 64 })
  matchId!: string;

  @Column({ name: 'group_id', type: 'varchar', length: 64 })
  groupId!: string;

  @Column({ name: 'predicted_winner', type: 'varchar', length: 8 })
  predictedWinner!: PredictedWinner;

  @Column({ name: 'predicted_home_score', type: 'integer' })
  predictedHomeScore!: number;

  @Column({ name: 'predicted_away_score', type: 'integer' })
  predictedAwayScore!: number;

  @Column({ name: 'placed_at', type: 'timestamptz' })
  placedAt!: Date;

  @Column({ type: 'integer', nullable: true })
  points!: number | null;

  @Column({ name: 'score_rule', type: 'varchar', length: 16, nullable: true })
  scoreRule!: ScoreRule | null;

  @Column({ name: 'settlement_state', type: 'varchar', length: 8, default: SettlementState.PENDING })
  settlementState!: SettlementState;

  // Identity of the final result this prediction was scored against
  @Column({ name: 'settled_result_key', type: 'varchar', length: 80, nullable: true })
  settledResultKey!: string | null;

  @Column({ name: 'settled_at', type: 'timestamptz', nullable: true })
  settledAt!: Date | null;

  @Column({ type: 'integer', default: 0 })
  version!: number;
}
