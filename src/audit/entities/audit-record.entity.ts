import { Entity, PrimaryGeneratedColumn, Column, Generated, Index } from 'typeorm';
import { AuditKind, AuditValue } from '../types/audit.types';

/**
 * Append-only. Rows are inserted by AuditService and never updated or deleted.
 */
@Entity('audit_records')
@Index('idx_audit_records_entity_sequence', ['entityId', 'sequence'])
export class AuditRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /** Insertion order; history pages are keyed on it. */
  @Column({ type: 'integer' })
  @Generated('increment')
  sequence!: number;

  @Column({ name: 'actor_id', type: 'text' })
  actorId!: string;

  @Column({ type: 'varchar', length: 32 })
  kind!: AuditKind;

  @Column({ name: 'entity_id', type: 'text' })
  entityId!: string;

  @Column({ name: 'before_value', type: 'jsonb', nullable: true })
  beforeValue!: AuditValue | null;

  @Column({ name: 'after_value', type: 'jsonb', nullable: true })
  afterValue!: AuditValue | null;

  @Column({ name: 'recorded_at', type: 'timestamptz' })
  recordedAt!: Date;
}
