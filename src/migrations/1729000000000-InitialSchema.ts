import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1729000000000 implements MigrationInterface {
  name = 'InitialSchema1729000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "api_keys" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "name" varchar(255) NOT NULL,
        "client_id" varchar(255) NOT NULL,
        "key_hash" varchar(255) NOT NULL,
        "key_prefix" varchar(12) NOT NULL,
        "is_active" boolean NOT NULL DEFAULT true,
        "expires_at" timestamptz,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "last_used_at" timestamptz,
        "revoked_at" timestamptz,
        CONSTRAINT "pk_api_keys" PRIMARY KEY ("id"),
        CONSTRAINT "uq_api_keys_key_hash" UNIQUE ("key_hash"),
        CONSTRAINT "uq_api_keys_client_id_name" UNIQUE ("client_id", "name")
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "ix_api_keys_key_prefix" ON "api_keys" ("key_prefix")`,
    );
    await queryRunner.query(`CREATE INDEX "ix_api_keys_client_id" ON "api_keys" ("client_id")`);
    await queryRunner.query(`CREATE INDEX "ix_api_keys_is_active" ON "api_keys" ("is_active")`);
    await queryRunner.query(`CREATE INDEX "ix_api_keys_expires_at" ON "api_keys" ("expires_at")`);

    await queryRunner.query(`
      CREATE TABLE "items" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "name" varchar(255) NOT NULL,
        "description" text,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "updated_at" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "pk_items" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(`CREATE INDEX "ix_items_name" ON "items" ("name")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "items"`);
    await queryRunner.query(`DROP TABLE "api_keys"`);
  }
}
