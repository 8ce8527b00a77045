import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateCandidateResponseTables1788310800000 implements MigrationInterface {
    name = 'CreateCandidateResponseTables1788310800000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "candidate_questionnaire_responses" ("id" SERIAL NOT NULL, "candidate_id" integer NOT NULL, "template_id" integer NOT NULL, "position_key" character varying(200) NOT NULL, "score" numeric NOT NULL DEFAULT '0', "max_score" numeric NOT NULL DEFAULT '0', "submitted_at" TIMESTAMP NOT NULL DEFAULT now(), "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_candidate_questionnaire_responses" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "UQ_responses_candidate_template" ON "candidate_questionnaire_responses" ("candidate_id", "template_id")`);
        await queryRunner.query(`CREATE INDEX "IDX_responses_position_submitted" ON "candidate_questionnaire_responses" ("position_key", "submitted_at")`);
        await queryRunner.query(`ALTER TABLE "candidate_questionnaire_responses" ADD CONSTRAINT "FK_responses_template" FOREIGN KEY ("template_id") REFERENCES "questionnaire_templates"("id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`CREATE TABLE "candidate_selected_options" ("id" SERIAL NOT NULL, "response_id" integer NOT NULL, "question_id" integer NOT NULL, "option_id" integer NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_candidate_selected_options" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "UQ_selected_options_response_question_option" ON "candidate_selected_options" ("response_id", "question_id", "option_id")`);
        await queryRunner.query(`CREATE INDEX "IDX_selected_options_option" ON "candidate_selected_options" ("option_id")`);
        await queryRunner.query(`ALTER TABLE "candidate_selected_options" ADD CONSTRAINT "FK_selected_options_response" FOREIGN KEY ("response_id") REFERENCES "candidate_questionnaire_responses"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "candidate_selected_options" ADD CONSTRAINT "FK_selected_options_question" FOREIGN KEY ("question_id") REFERENCES "questions"("id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "candidate_selected_options" ADD CONSTRAINT "FK_selected_options_option" FOREIGN KEY ("option_id") REFERENCES "question_options"("id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "candidate_selected_options" DROP CONSTRAINT "FK_selected_options_option"`);
        await queryRunner.query(`ALTER TABLE "candidate_selected_options" DROP CONSTRAINT "FK_selected_options_question"`);
        await queryRunner.query(`ALTER TABLE "candidate_selected_options" DROP CONSTRAINT "FK_selected_options_response"`);
        await queryRunner.query(`DROP TABLE "candidate_selected_options"`);
        await queryRunner.query(`ALTER TABLE "candidate_questionnaire_responses" DROP CONSTRAINT "FK_responses_template"`);
        await queryRunner.query(`DROP TABLE "candidate_questionnaire_responses"`);
    }

}
