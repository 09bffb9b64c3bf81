import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1717171717000 implements MigrationInterface {
  name = 'InitialSchema1717171717000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "plans" (
        "id" varchar(64) PRIMARY KEY,
        "name" varchar(128) NOT NULL,
        "amount_minor" integer NOT NULL CHECK ("amount_minor" >= 0),
        "returning_amount_minor" integer CHECK ("returning_amount_minor" >= 0),
        "currency" char(3) NOT NULL,
        "billing_period_days" integer NOT NULL CHECK ("billing_period_days" > 0),
        "updated_at" timestamptz NOT NULL
      )`);

    await queryRunner.query(`
      CREATE TABLE "subscriptions" (
        "id" uuid PRIMARY KEY,
        "user_id" varchar(64) NOT NULL,
        "plan_id" varchar(64) NOT NULL,
        "amount_minor" integer NOT NULL,
        "currency" char(3) NOT NULL,
        "billing_period_days" integer NOT NULL,
        "state" varchar(16) NOT NULL
          CHECK ("state" IN ('pending', 'active', 'grace_period', 'expired', 'canceled')),
        "current_period_end" timestamptz,
        "auto_renew" boolean NOT NULL DEFAULT true,
        "provider_name" varchar(32) NOT NULL,
        "provider_subscription_ref" varchar(255),
        "created_at" timestamptz NOT NULL,
        "updated_at" timestamptz NOT NULL
      )`);
    await queryRunner.query(`
      CREATE UNIQUE INDEX "uq_subscriptions_open_user" ON "subscriptions" ("user_id")
      WHERE "state" IN ('pending', 'active', 'grace_period')`);
    await queryRunner.query(
      `CREATE INDEX "ix_subscriptions_state_period_end" ON "subscriptions" ("state", "current_period_end")`,
    );
    await queryRunner.query(
      `CREATE INDEX "ix_subscriptions_provider_ref" ON "subscriptions" ("provider_name", "provider_subscription_ref")`,
    );

    await queryRunner.query(`
      CREATE TABLE "payment_events" (
        "id" uuid PRIMARY KEY,
        "provider_event_id" varchar(255) NOT NULL,
        "subscription_id" uuid NOT NULL REFERENCES "subscriptions" ("id"),
        "kind" varchar(32) NOT NULL,
        "raw_payload" text NOT NULL,
        "processed_at" timestamptz,
        "received_at" timestamptz NOT NULL
      )`);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "uq_payment_events_provider_event_id" ON "payment_events" ("provider_event_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "ix_payment_events_subscription" ON "payment_events" ("subscription_id")`,
    );

    await queryRunner.query(`
      CREATE TABLE "membership_intents" (
        "id" uuid PRIMARY KEY,
        "subscription_id" uuid NOT NULL REFERENCES "subscriptions" ("id"),
        "user_id" varchar(64) NOT NULL,
        "desired_state" varchar(16) NOT NULL CHECK ("desired_state" IN ('member', 'removed')),
        "applied" boolean NOT NULL DEFAULT false,
        "status" varchar(16) NOT NULL
          CHECK ("status" IN ('pending', 'applied', 'failed', 'superseded')),
        "attempt_count" integer NOT NULL DEFAULT 0,
        "last_attempt_at" timestamptz,
        "next_attempt_at" timestamptz NOT NULL,
        "last_error" text,
        "created_at" timestamptz NOT NULL
      )`);
    await queryRunner.query(
      `CREATE INDEX "ix_membership_intents_due" ON "membership_intents" ("status", "next_attempt_at")`,
    );
    await queryRunner.query(
      `CREATE INDEX "ix_membership_intents_subscription" ON "membership_intents" ("subscription_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "ix_membership_intents_user" ON "membership_intents" ("user_id", "created_at")`,
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "membership_intents"`);
    await queryRunner.query(`DROP TABLE "payment_events"`);
    await queryRunner.query(`DROP TABLE "subscriptions"`);
    await queryRunner.query(`DROP TABLE "plans"`);
  }
}
