import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { MatchStatus } from '../types/deadline.types';

@Entity('matches')
@Index('idx_matches_pairing_start', ['groupId', 'competitionId', 'scheduledStart'])
export class Match {
  // Assigned by the schedule collaborator
  @PrimaryColumn({ type: 'varchar', length: 64 })
  id!: string;

  @Column({ name: 'group_id', type: 'varchar', length: 64 })
  groupId!: string;

  @Column({ name: 'competition_id', type: 'varchar', length: 64 })
  competitionId!: string;

  @Column({ name: 'home_side', type: 'text', nullable: true })
  homeSide!: string | null;

  @Column({ name: 'away_side', type: 'text', nullable: true })
  awaySide!: string | null;

  @Column({ name: 'scheduled_start', type: 'timestamptz' })
  scheduledStart!: Date;

  @Column({ type: 'timestamptz' })
  deadline!: Date;

  @Column({ name: 'deadline_overridden', type: 'boolean', default: false })
  deadlineOverridden!: boolean;

  @Column({ name: 'deadline_locked', type: 'boolean', default: false })
  deadlineLocked!: boolean;

  @Column({ name: 'locked_at', type: 'timestamptz', nullable: true })
  lockedAt!: Date | null;

  @Column({ type: 'varchar', length: 16, default: MatchStatus.SCHEDULED })
  status!: MatchStatus;

  @Column({ type: 'integer', default: 0 })
  version!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
