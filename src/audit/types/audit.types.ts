export enum AuditKind {
  DEADLINE_OVERRIDE = 'DEADLINE_OVERRIDE',
  RESULT_CORRECTION = 'RESULT_CORRECTION',
  RESULT_FINALIZED = 'RESULT_FINALIZED',
  MATCH_CANCELLED = 'MATCH_CANCELLED',
}

export type AuditValue = Record<string, string | number | boolean | null>;

export interface AuditEntry {
  actorId: string;
  kind: AuditKind;
  entityId: string;
  before: AuditValue | null;
  after: AuditValue | null;
}
