import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * Local mirror of the identity collaborator's group rosters.
 */
@Entity('group_memberships')
@Index('idx_group_memberships_user', ['userId'])
export class GroupMembership {
  @PrimaryColumn({ name: 'group_id', type: 'varchar', length: 64 })
  groupId!: string;

  @PrimaryColumn({ name: 'user_id', type: 'varchar', length: 64 })
  userId!: string;

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  // User registration time; last-resort leaderboard tie-break
  @Column({ name: 'registered_at', type: 'timestamptz', nullable: true })
  registeredAt!: Date | null;

  @Column({ name: 'joined_at', type: 'timestamptz' })
  joinedAt!: Date;
}
