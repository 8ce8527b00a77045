import { Decimal } from "decimal.js";
import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, JoinColumn, Index } from "typeorm";
import { QuestionnaireTemplate } from "./questionnaire-template.entity";
import { CandidateSelectedOption } from "./candidate-selected-option.entity";
import { decimalTransformer } from "../decimal.transformer";

/**
 * CandidateQuestionnaireResponse Entity
 *
 * A candidate's submission against one template. score and max_score are
 * derived from the selections and the template's current configuration;
 * they are only ever written by the recorder and the recalculation service.
 *
 * One response per (candidate, template): resubmitting replaces the previous
 * response and its selections in the same transaction.
 */
@Entity({ name: "candidate_questionnaire_responses" })
@Index("UQ_responses_candidate_template", ["candidateId", "templateId"], { unique: true })
@Index("IDX_responses_position_submitted", ["position_key", "submitted_at"])
export class CandidateQuestionnaireResponse {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "candidate_id", type: "int" })
    candidateId!: number; // Owned by the candidate service, not by this schema

    @Column({ name: "template_id", type: "int" })
    templateId!: number;

    @ManyToOne(() => QuestionnaireTemplate, { onDelete: "RESTRICT" })
    @JoinColumn({ name: "template_id" })
    template?: QuestionnaireTemplate;

    @Column({
        type: "varchar",
        length: 200
    })
    position_key!: string; // Denormalized from the template for analytics

    @Column({
        type: "numeric",
        default: 0,
        transformer: decimalTransformer
    })
    score!: Decimal;

    @Column({
        type: "numeric",
        default: 0,
        transformer: decimalTransformer
    })
    max_score!: Decimal;

    @OneToMany(() => CandidateSelectedOption, (selection) => selection.response)
    selected_options?: CandidateSelectedOption[];

    @Column({ type: "timestamp", default: () => "now()" })
    submitted_at!: Date;

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at" })
    updated_at!: Date;
}
