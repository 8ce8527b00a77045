import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, OneToMany, Index } from "typeorm";
import { Question } from "./question.entity";

/**
 * QuestionnaireTemplate Entity
 *
 * A questionnaire bound to a job position. Each active template is one step
 * of the candidate's multi-step application form.
 *
 * Step ordering:
 * - Several templates may be active for the same position at once
 * - Steps are presented by step_number, then title, then id
 *
 * Lifecycle:
 * - Created inactive; activated/deactivated independently of its siblings
 * - Deactivated instead of deleted once responses reference it
 * - version is bumped whenever its scoring configuration changes
 */
@Entity({ name: "questionnaire_templates" })
@Index("IDX_templates_position_step", ["position_key", "step_number"])
@Index("IDX_templates_position_active", ["position_key", "is_active"])
export class QuestionnaireTemplate {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 200
    })
    position_key!: string; // Matches the job position the candidate applied for

    @Column({
        type: "varchar",
        length: 255
    })
    title!: string;

    @Column({
        type: "text",
        default: ""
    })
    description!: string; // Shown to candidates above the questions

    @Column({
        type: "int",
        default: 1
    })
    step_number!: number;

    @Column({
        type: "int",
        default: 1
    })
    version!: number;

    @Column({
        type: "boolean",
        default: false
    })
    is_active!: boolean;

    @OneToMany(() => Question, (question) => question.template)
    questions?: Question[];

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at" })
    updated_at!: Date;
}
