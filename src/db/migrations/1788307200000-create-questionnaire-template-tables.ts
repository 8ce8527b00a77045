import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateQuestionnaireTemplateTables1788307200000 implements MigrationInterface {
    name = 'CreateQuestionnaireTemplateTables1788307200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "questionnaire_templates" ("id" SERIAL NOT NULL, "position_key" character varying(200) NOT NULL, "title" character varying(255) NOT NULL, "description" text NOT NULL DEFAULT '', "step_number" integer NOT NULL DEFAULT '1', "version" integer NOT NULL DEFAULT '1', "is_active" boolean NOT NULL DEFAULT false, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_questionnaire_templates" PRIMARY KEY ("id"), CONSTRAINT "CHK_templates_step_number" CHECK ("step_number" >= 1))`);
        await queryRunner.query(`CREATE INDEX "IDX_templates_position_step" ON "questionnaire_templates" ("position_key", "step_number")`);
        await queryRunner.query(`CREATE INDEX "IDX_templates_position_active" ON "questionnaire_templates" ("position_key", "is_active")`);
        await queryRunner.query(`CREATE TABLE "questions" ("id" SERIAL NOT NULL, "template_id" integer NOT NULL, "question_text" text NOT NULL, "question_type" character varying(20) NOT NULL DEFAULT 'multi_select', "points" numeric(7,2) NOT NULL DEFAULT '1', "scoring_mode" character varying(20) NOT NULL DEFAULT 'all_or_nothing', "order" integer NOT NULL DEFAULT '0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_questions" PRIMARY KEY ("id"), CONSTRAINT "CHK_questions_points" CHECK ("points" >= 0))`);
        await queryRunner.query(`ALTER TABLE "questions" ADD CONSTRAINT "FK_questions_template" FOREIGN KEY ("template_id") REFERENCES "questionnaire_templates"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`CREATE TABLE "question_options" ("id" SERIAL NOT NULL, "question_id" integer NOT NULL, "option_text" character varying(500) NOT NULL, "is_correct" boolean NOT NULL DEFAULT false, "option_points" numeric(9,2) NOT NULL DEFAULT '0', "order" integer NOT NULL DEFAULT '0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_question_options" PRIMARY KEY ("id"), CONSTRAINT "CHK_question_options_points" CHECK ("option_points" >= 0))`);
        await queryRunner.query(`ALTER TABLE "question_options" ADD CONSTRAINT "FK_question_options_question" FOREIGN KEY ("question_id") REFERENCES "questions"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "question_options" DROP CONSTRAINT "FK_question_options_question"`);
        await queryRunner.query(`DROP TABLE "question_options"`);
        await queryRunner.query(`ALTER TABLE "questions" DROP CONSTRAINT "FK_questions_template"`);
        await queryRunner.query(`DROP TABLE "questions"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_templates_position_active"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_templates_position_step"`);
        await queryRunner.query(`DROP TABLE "questionnaire_templates"`);
    }

}
