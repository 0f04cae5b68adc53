import { MigrationInterface, QueryRunner } from "typeorm";

export class InterestsText1761000000000 implements MigrationInterface {
    name = 'InterestsText1761000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "users" ALTER COLUMN "interests" TYPE text`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "users" ALTER COLUMN "interests" TYPE character varying(1024) USING left("interests", 1024)`);
    }
}
