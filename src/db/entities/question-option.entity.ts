import { Decimal } from "decimal.js";
import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from "typeorm";
import { Question } from "./question.entity";
import { decimalTransformer } from "../decimal.transformer";

/**
 * QuestionOption Entity
 *
 * A selectable answer. is_correct drives all_or_nothing and partial scoring;
 * option_points drives weighted scoring (and weights partial credit when the
 * correct options carry any).
 */
@Entity({ name: "question_options" })
export class QuestionOption {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "question_id", type: "int" })
    questionId!: number;

    @ManyToOne(() => Question, (question) => question.options, { onDelete: "CASCADE" })
    @JoinColumn({ name: "question_id" })
    question?: Question;

    @Column({
        type: "varchar",
        length: 500
    })
    option_text!: string;

    @Column({
        type: "boolean",
        default: false
    })
    is_correct!: boolean;

    @Column({
        type: "numeric",
        precision: 9,
        scale: 2,
        default: 0,
        transformer: decimalTransformer
    })
    option_points!: Decimal;

    @Column({
        type: "int",
        default: 0
    })
    order!: number;

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at" })
    updated_at!: Date;
}
