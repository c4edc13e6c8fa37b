import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1730000000001 implements MigrationInterface {
  name = 'InitialSchema1730000000001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // Create matches table
    await queryRunner.query(`
      CREATE TABLE "matches" (
        "id" varchar(64) NOT NULL,
        "group_id" varchar(64) NOT NULL,
        "competition_id" varchar(64) NOT NULL,
        "home_side" text,
        "away_side" text,
        "scheduled_start" TIMESTAMP WITH TIME ZONE NOT NULL,
        "deadline" TIMESTAMP WITH TIME ZONE NOT NULL,
        "deadline_overridden" boolean NOT NULL DEFAULT false,
        "deadline_locked" boolean NOT NULL DEFAULT false,
        "locked_at" TIMESTAMP WITH TIME ZONE,
        "status" varchar(16) NOT NULL DEFAULT 'SCHEDULED',
        "version" integer NOT NULL DEFAULT 0,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_matches" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_matches_deadline_before_start" CHECK ("deadline" < "scheduled_start")
      )
    `);

    // Create group memberships table
    await queryRunner.query(`
      CREATE TABLE "group_memberships" (
        "group_id" varchar(64) NOT NULL,
        "user_id" varchar(64) NOT NULL,
        "active" boolean NOT NULL DEFAULT true,
        "registered_at" TIMESTAMP WITH TIME ZONE,
        "joined_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        CONSTRAINT "PK_group_memberships" PRIMARY KEY ("group_id", "user_id")
      )
    `);

    // Create predictions table
    await queryRunner.query(`
      CREATE TABLE "predictions" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "user_id" varchar(64) NOT NULL,
        "match_id" varchar(64) NOT NULL,
        "group_id" varchar(64) NOT NULL,
        "predicted_winner" varchar(8) NOT NULL,
        "predicted_home_score" integer NOT NULL,
        "predicted_away_score" integer NOT NULL,
        "placed_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "points" integer,
        "score_rule" varchar(16),
        "settlement_state" varchar(8) NOT NULL DEFAULT 'PENDING',
        "settled_result_key" varchar(80),
        "settled_at" TIMESTAMP WITH TIME ZONE,
        "version" integer NOT NULL DEFAULT 0,
        CONSTRAINT "PK_predictions" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_predictions_scores" CHECK ("predicted_home_score" >= 0 AND "predicted_away_score" >= 0)
      )
    `);

    // Create match results table
    await queryRunner.query(`
      CREATE TABLE "match_results" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "match_id" varchar(64) NOT NULL,
        "home_score" integer NOT NULL,
        "away_score" integer NOT NULL,
        "winner" varchar(8) NOT NULL,
        "state" varchar(16) NOT NULL,
        "entered_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "finalized_at" TIMESTAMP WITH TIME ZONE,
        "entered_by" varchar(64) NOT NULL,
        "version" integer NOT NULL DEFAULT 0,
        CONSTRAINT "PK_match_results" PRIMARY KEY ("id")
      )
    `);

    // Create audit records table (insert-only)
    await queryRunner.query(`
      CREATE TABLE "audit_records" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "sequence" SERIAL NOT NULL,
        "actor_id" text NOT NULL,
        "kind" varchar(32) NOT NULL,
        "entity_id" text NOT NULL,
        "before_value" jsonb,
        "after_value" jsonb,
        "recorded_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        CONSTRAINT "PK_audit_records" PRIMARY KEY ("id")
      )
    `);

    // Add foreign key constraints
    await queryRunner.query(`
      ALTER TABLE "predictions"
      ADD CONSTRAINT "FK_predictions_matches"
      FOREIGN KEY ("match_id") REFERENCES "matches"("id") ON DELETE RESTRICT
    `);

    await queryRunner.query(`
      ALTER TABLE "match_results"
      ADD CONSTRAINT "FK_match_results_matches"
      FOREIGN KEY ("match_id") REFERENCES "matches"("id") ON DELETE RESTRICT
    `);

    // Create indexes
    await queryRunner.query(`
      CREATE INDEX "idx_matches_pairing_start" ON "matches"("group_id", "competition_id", "scheduled_start")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_group_memberships_user" ON "group_memberships"("user_id")
    `);

    await queryRunner.query(`
      CREATE UNIQUE INDEX "uq_predictions_user_match_group" ON "predictions"("user_id", "match_id", "group_id")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_predictions_match" ON "predictions"("match_id")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_predictions_group_state" ON "predictions"("group_id", "settlement_state")
    `);

    await queryRunner.query(`
      CREATE UNIQUE INDEX "uq_match_results_match" ON "match_results"("match_id")
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_audit_records_entity_sequence" ON "audit_records"("entity_id", "sequence")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "idx_audit_records_entity_sequence"`);
    await queryRunner.query(`DROP INDEX "uq_match_results_match"`);
    await queryRunner.query(`DROP INDEX "idx_predictions_group_state"`);
    await queryRunner.query(`DROP INDEX "idx_predictions_match"`);
    await queryRunner.query(`DROP INDEX "uq_predictions_user_match_group"`);
    await queryRunner.query(`DROP INDEX "idx_group_memberships_user"`);
    await queryRunner.query(`DROP INDEX "idx_matches_pairing_start"`);

    await queryRunner.query(`ALTER TABLE "match_results" DROP CONSTRAINT "FK_match_results_matches"`);
    await queryRunner.query(`ALTER TABLE "predictions" DROP CONSTRAINT "FK_predictions_matches"`);

    await queryRunner.query(`DROP TABLE "audit_records"`);
    await queryRunner.query(`DROP TABLE "match_results"`);
    await queryRunner.query(`DROP TABLE "predictions"`);
    await queryRunner.query(`DROP TABLE "group_memberships"`);
    await queryRunner.query(`DROP TABLE "matches"`);
  }
}
