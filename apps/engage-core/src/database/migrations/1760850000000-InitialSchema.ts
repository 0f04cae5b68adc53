import { MigrationInterface, QueryRunner } from "typeorm";

export class InitialSchema1760850000000 implements MigrationInterface {
    name = 'InitialSchema1760850000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

        await queryRunner.query(`
            CREATE TABLE "users" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "email" character varying(255) NOT NULL,
                "password_hash" character varying(255) NOT NULL,
                "name" character varying(255) NOT NULL,
                "job_title" character varying(255),
                "interests" character varying(1024),
                "contact_preference" character varying(50) NOT NULL DEFAULT 'email',
                "phone_number" character varying(50),
                "profile_image_url" character varying(1024),
                "is_admin" boolean NOT NULL DEFAULT false,
                "created_at" TIMESTAMP NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "UQ_users_email" UNIQUE ("email"),
                CONSTRAINT "PK_users" PRIMARY KEY ("id")
            )
        `);
        await queryRunner.query(`CREATE INDEX "IDX_users_email" ON "users" ("email")`);

        await queryRunner.query(`
            CREATE TABLE "events" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "name" character varying(255) NOT NULL,
                "description" text NOT NULL,
                "event_time" TIMESTAMP WITH TIME ZONE NOT NULL,
                "image_url" character varying(1024),
                "recording_url" character varying(1024),
                "created_at" TIMESTAMP NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "PK_events" PRIMARY KEY ("id")
            )
        `);
        await queryRunner.query(`CREATE INDEX "IDX_events_name" ON "events" ("name")`);
        await queryRunner.query(`CREATE INDEX "IDX_events_event_time" ON "events" ("event_time")`);

        await queryRunner.query(`
            CREATE TABLE "registrations" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "user_id" uuid NOT NULL,
                "event_id" uuid NOT NULL,
                "registration_time" TIMESTAMP WITH TIME ZONE NOT NULL,
                CONSTRAINT "uq_registration_user_event" UNIQUE ("user_id", "event_id"),
                CONSTRAINT "PK_registrations" PRIMARY KEY ("id"),
                CONSTRAINT "FK_registrations_user" FOREIGN KEY ("user_id")
                    REFERENCES "users"("id") ON DELETE CASCADE,
                CONSTRAINT "FK_registrations_event" FOREIGN KEY ("event_id")
                    REFERENCES "events"("id") ON DELETE CASCADE
            )
        `);
        await queryRunner.query(`CREATE INDEX "idx_registrations_event" ON "registrations" ("event_id")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "public"."idx_registrations_event"`);
        await queryRunner.query(`DROP TABLE "registrations"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_events_event_time"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_events_name"`);
        await queryRunner.query(`DROP TABLE "events"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_users_email"`);
        await queryRunner.query(`DROP TABLE "users"`);
    }
}
