import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { PredictedWinner } from '../../prediction/types/scoring.types';
import { ResultState } from '../types/result.types';

@Entity('match_results')
@Index('uq_match_results_match', ['matchId'], { unique: true })
export class MatchResult {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'match_id', type: 'varchar', length: 64 })
  matchId!: string;

  @Column({ name: 'home_score', type: 'integer' })
  homeScore!: number;

  @Column({ name: 'away_score', type: 'integer' })
  awayScore!: number;

  // Always derived from the scores
  @Column({ type: 'varchar', length: 8 })
  winner!: PredictedWinner;

  @Column({ type: 'varchar', length: 16 })
  state!: ResultState;

  @Column({ name: 'entered_at', type: 'timestamptz' })
  enteredAt!: Date;

  @Column({ name: 'finalized_at', type: 'timestamptz', nullable: true })
  finalizedAt!: Date | null;

  @Column({ name: 'entered_by', type: 'varchar', length: 64 })
  enteredBy!: string;

  @Column({ type: 'integer', default: 0 })
  version!: number;
}
