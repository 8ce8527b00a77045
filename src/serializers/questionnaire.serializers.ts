import { Decimal } from 'decimal.js';
import type { QuestionnaireTemplate } from '../db/entities/questionnaire-template.entity';
import type { QuestionOption } from '../db/entities/question-option.entity';
import type { Question } from '../db/entities/question.entity';
import type { CandidateQuestionnaireResponse } from '../db/entities/candidate-questionnaire-response.entity';
import type { CandidateSelectedOption } from '../db/entities/candidate-selected-option.entity';
import type { QuestionWithOptions, TemplateWithQuestions } from '../db/interfaces';
import { percentageOf } from '../services/scoring.service';
import type { QuestionLintWarning, QuestionScore, QuestionType, ScoringMode } from '../types/questionnaire';

/**
 * JSON projections for the HTTP layer.
 *
 * Public projections never carry is_correct, option_points, points or
 * scoring_mode. Decimals are rounded to two places here and only here.
 */

export function toDisplay(value: Decimal): number {
    return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

export interface PublicOptionView {
    id: number;
    option_text: string;
    order: number;
}

export interface PublicQuestionView {
    id: number;
    question_text: string;
    question_type: QuestionType;
    order: number;
    options: PublicOptionView[];
}

export interface PublicTemplateView {
    id: number;
    position_key: string;
    title: string;
    step_number: number;
    description: string;
    version: number;
    questions: PublicQuestionView[];
}

export interface AdminOptionView extends PublicOptionView {
    is_correct: boolean;
    option_points: number;
}

export interface AdminQuestionView {
    id: number;
    template_id: number;
    question_text: string;
    question_type: QuestionType;
    order: number;
    points: number;
    scoring_mode: ScoringMode;
    options: AdminOptionView[];
}

export interface TemplateSummaryView {
    id: number;
    position_key: string;
    title: string;
    step_number: number;
    description: string;
    version: number;
    is_active: boolean;
    created_at: Date;
    updated_at: Date;
}

export interface AdminTemplateView extends TemplateSummaryView {
    total_points: number;
    questions: AdminQuestionView[];
    warnings: QuestionLintWarning[];
}

export interface ResponseView {
    id: number;
    candidate_id: number;
    template_id: number;
    position_key: string;
    score: number;
    max_score: number;
    percentage: number;
    submitted_at: Date;
}

export interface QuestionScoreView {
    question_id: number;
    scoring_mode: ScoringMode;
    selected_option_ids: number[];
    earned: number;
    possible: number;
}

export function serializePublicTemplate(template: TemplateWithQuestions): PublicTemplateView {
    return {
        id: template.id,
        position_key: template.position_key,
        title: template.title,
        step_number: template.step_number,
        description: template.description,
        version: template.version,
        questions: template.questions.map((question) => ({
            id: question.id,
            question_text: question.question_text,
            question_type: question.question_type,
            order: question.order,
            options: question.options.map((option) => ({
                id: option.id,
                option_text: option.option_text,
                order: option.order
            }))
        }))
    };
}

export function serializeOption(option: QuestionOption): AdminOptionView {
    return {
        id: option.id,
        option_text: option.option_text,
        order: option.order,
        is_correct: option.is_correct,
        option_points: toDisplay(option.option_points)
    };
}

export function serializeQuestion(question: Question, options: QuestionOption[] = []): AdminQuestionView {
    return {
        id: question.id,
        template_id: question.templateId,
        question_text: question.question_text,
        question_type: question.question_type,
        order: question.order,
        points: toDisplay(question.points),
        scoring_mode: question.scoring_mode,
        options: options.map(serializeOption)
    };
}

export function serializeTemplateSummary(template: QuestionnaireTemplate): TemplateSummaryView {
    return {
        id: template.id,
        position_key: template.position_key,
        title: template.title,
        step_number: template.step_number,
        description: template.description,
        version: template.version,
        is_active: template.is_active,
        created_at: template.created_at,
        updated_at: template.updated_at
    };
}

export function serializeAdminTemplate(template: TemplateWithQuestions, warnings: QuestionLintWarning[]): AdminTemplateView {
    const totalPoints = template.questions.reduce(
        (total: Decimal, question: QuestionWithOptions) => total.plus(question.points),
        new Decimal(0)
    );
    return {
        ...serializeTemplateSummary(template),
        total_points: toDisplay(totalPoints),
        questions: template.questions.map((question) => serializeQuestion(question, question.options)),
        warnings
    };
}

export function serializeResponse(response: CandidateQuestionnaireResponse): ResponseView {
    return {
        id: response.id,
        candidate_id: response.candidateId,
        template_id: response.templateId,
        position_key: response.position_key,
        score: toDisplay(response.score),
        max_score: toDisplay(response.max_score),
        percentage: toDisplay(percentageOf(response.score, response.max_score)),
        submitted_at: response.submitted_at
    };
}

export function serializeBreakdown(breakdown: QuestionScore[]): QuestionScoreView[] {
    return breakdown.map((entry) => ({
        question_id: entry.questionId,
        scoring_mode: entry.scoringMode,
        selected_option_ids: entry.selectedOptionIds,
        earned: toDisplay(entry.earned),
        possible: toDisplay(entry.possible)
    }));
}

export function serializeSelections(selections: CandidateSelectedOption[]): Array<{ id: number; question_id: number; option_id: number; created_at: Date }> {
    return selections.map((selection) => ({
        id: selection.id,
        question_id: selection.questionId,
        option_id: selection.optionId,
        created_at: selection.created_at
    }));
}
