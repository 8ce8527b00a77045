import { Decimal } from "decimal.js";
import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, JoinColumn } from "typeorm";
import { QuestionnaireTemplate } from "./questionnaire-template.entity";
import { QuestionOption } from "./question-option.entity";
import { decimalTransformer } from "../decimal.transformer";
import type { QuestionType, ScoringMode } from "../../types/questionnaire";

/**
 * Question Entity
 *
 * One scorable prompt inside a template. `points` is the most this question
 * can contribute; `scoring_mode` decides how much of it a candidate earns:
 * - all_or_nothing: full points only for the exact set of correct options
 * - partial: share of the correct options' weight that was selected
 * - weighted: share of option_points selected, ignoring is_correct
 *
 * Editing points, scoring_mode or question_type re-scores every response to
 * the owning template.
 */
@Entity({ name: "questions" })
export class Question {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "template_id", type: "int" })
    templateId!: number;

    @ManyToOne(() => QuestionnaireTemplate, (template) => template.questions, { onDelete: "CASCADE" })
    @JoinColumn({ name: "template_id" })
    template?: QuestionnaireTemplate;

    @Column({ type: "text" })
    question_text!: string;

    @Column({
        type: "varchar",
        length: 20,
        default: "multi_select"
    })
    question_type!: QuestionType;

    @Column({
        type: "numeric",
        precision: 7,
        scale: 2,
        default: 1,
        transformer: decimalTransformer
    })
    points!: Decimal;

    @Column({
        type: "varchar",
        length: 20,
        default: "all_or_nothing"
    })
    scoring_mode!: ScoringMode;

    @Column({
        type: "int",
        default: 0
    })
    order!: number; // Display sequence within the template

    @OneToMany(() => QuestionOption, (option) => option.question)
    options?: QuestionOption[];

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at" })
    updated_at!: Date;
}
