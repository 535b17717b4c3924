import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateBillingLedger1790000000000 implements MigrationInterface {
  name = 'CreateBillingLedger1790000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS "courses" (
      "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
      "name" character varying(100) NOT NULL,
      "weekDays" jsonb NOT NULL DEFAULT '[]',
      "lessonPerMonth" integer NOT NULL,
      "cost" numeric(12,2) NOT NULL,
      CONSTRAINT "PK_courses" PRIMARY KEY ("id")
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS "students" (
      "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
      "name" character varying(50) NOT NULL,
      "surname" character varying(50) NOT NULL,
      "secondName" character varying(50) NULL,
      "startingDate" date NOT NULL,
      "numLesson" integer NOT NULL DEFAULT 0,
      "totalMoney" numeric NOT NULL DEFAULT 0,
      "attendance" jsonb NOT NULL DEFAULT '[]',
      "isArchived" boolean NOT NULL DEFAULT false,
      "version" integer NOT NULL DEFAULT 0,
      CONSTRAINT "PK_students" PRIMARY KEY ("id")
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS "student_course_progress" (
      "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
      "studentId" uuid NOT NULL,
      "courseId" uuid NOT NULL,
      "enrollmentDate" date NOT NULL,
      "lessonsAttended" integer NOT NULL DEFAULT 0,
      "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
      CONSTRAINT "PK_student_course_progress" PRIMARY KEY ("id"),
      CONSTRAINT "UQ_student_course_progress_student_course" UNIQUE ("studentId", "courseId"),
      CONSTRAINT "FK_student_course_progress_student" FOREIGN KEY ("studentId") REFERENCES "students"("id") ON DELETE CASCADE,
      CONSTRAINT "FK_student_course_progress_course" FOREIGN KEY ("courseId") REFERENCES "courses"("id") ON DELETE CASCADE
    )`);

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS "payments" (
      "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
      "studentId" uuid NOT NULL,
      "courseId" uuid NOT NULL,
      "amount" numeric(12,2) NOT NULL,
      "date" date NOT NULL,
      "description" character varying(200) NOT NULL DEFAULT 'Monthly payment',
      "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
      CONSTRAINT "PK_payments" PRIMARY KEY ("id"),
      CONSTRAINT "CHK_payments_amount_positive" CHECK ("amount" > 0),
      CONSTRAINT "FK_payments_student" FOREIGN KEY ("studentId") REFERENCES "students"("id") ON DELETE CASCADE,
      CONSTRAINT "FK_payments_course" FOREIGN KEY ("courseId") REFERENCES "courses"("id") ON DELETE CASCADE
    )`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_payments_studentId" ON "payments" ("studentId")`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_payments_courseId" ON "payments" ("courseId")`);

    await queryRunner.query(`DO $$ BEGIN
      IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'logs_level_enum') THEN
        CREATE TYPE "logs_level_enum" AS ENUM ('info', 'warn', 'error');
      END IF; END $$;`);
    await queryRunner.query(`CREATE TABLE IF NOT EXISTS "logs" (
      "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
      "action" character varying NOT NULL,
      "module" character varying(50) NOT NULL,
      "level" "logs_level_enum" NOT NULL DEFAULT 'info',
      "entityId" character varying NULL,
      "entityType" character varying NULL,
      "oldValues" json NULL,
      "newValues" json NULL,
      "metadata" json NULL,
      "timestamp" TIMESTAMP NOT NULL DEFAULT now(),
      CONSTRAINT "PK_logs" PRIMARY KEY ("id")
    )`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_logs_module" ON "logs" ("module")`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_logs_entityId" ON "logs" ("entityId")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "logs"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "logs_level_enum"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "payments"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "student_course_progress"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "students"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "courses"`);
  }
}
