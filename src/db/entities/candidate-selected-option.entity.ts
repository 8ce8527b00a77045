import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, ManyToOne, JoinColumn, Index } from "typeorm";
import { CandidateQuestionnaireResponse } from "./candidate-questionnaire-response.entity";
import { Question } from "./question.entity";
import { QuestionOption } from "./question-option.entity";

/**
 * CandidateSelectedOption Entity
 *
 * One recorded choice. Rows are written in bulk at submission and never
 * edited afterwards, so any response can be re-scored as the rubric evolves.
 */
@Entity({ name: "candidate_selected_options" })
@Index("UQ_selected_options_response_question_option", ["responseId", "questionId", "optionId"], { unique: true })
@Index("IDX_selected_options_option", ["optionId"])
export class CandidateSelectedOption {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: "response_id", type: "int" })
    responseId!: number;

    @ManyToOne(() => CandidateQuestionnaireResponse, (response) => response.selected_options, { onDelete: "CASCADE" })
    @JoinColumn({ name: "response_id" })
    response?: CandidateQuestionnaireResponse;

    @Column({ name: "question_id", type: "int" })
    questionId!: number;

    @ManyToOne(() => Question, { onDelete: "RESTRICT" })
    @JoinColumn({ name: "question_id" })
    question?: Question;

    @Column({ name: "option_id", type: "int" })
    optionId!: number;

    @ManyToOne(() => QuestionOption, { onDelete: "RESTRICT" })
    @JoinColumn({ name: "option_id" })
    option?: QuestionOption;

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
