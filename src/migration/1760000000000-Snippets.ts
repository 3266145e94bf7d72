import { MigrationInterface, QueryRunner } from 'typeorm';

export class Snippets1760000000000 implements MigrationInterface {
  name = 'Snippets1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TABLE "user" ("id" character varying(36) NOT NULL, "username" text NOT NULL, "name" text, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_user_id" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_user_username_unique" ON "user" ("username")`,
    );
    await queryRunner.query(
      `CREATE TABLE "snippet" ("id" SERIAL NOT NULL, "created" TIMESTAMP NOT NULL DEFAULT now(), "title" text NOT NULL DEFAULT '', "code" text NOT NULL, "linenos" boolean NOT NULL DEFAULT false, "language" text NOT NULL DEFAULT 'python', "style" text NOT NULL DEFAULT 'friendly', "highlighted" text NOT NULL, "ownerId" character varying(36) NOT NULL, CONSTRAINT "PK_snippet_id" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_snippet_created_id" ON "snippet" ("created", "id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_snippet_owner_id" ON "snippet" ("ownerId")`,
    );
    await queryRunner.query(
      `ALTER TABLE "snippet" ADD CONSTRAINT "FK_snippet_owner_id" FOREIGN KEY ("ownerId") REFERENCES "user"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `ALTER TABLE "snippet" DROP CONSTRAINT "FK_snippet_owner_id"`,
    );
    await queryRunner.query(`DROP INDEX "IDX_snippet_owner_id"`);
    await queryRunner.query(`DROP INDEX "IDX_snippet_created_id"`);
    await queryRunner.query(`DROP TABLE "snippet"`);
    await queryRunner.query(`DROP INDEX "IDX_user_username_unique"`);
    await queryRunner.query(`DROP TABLE "user"`);
  }
}
