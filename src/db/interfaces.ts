import type { Decimal } from 'decimal.js';
import type { QuestionnaireTemplate } from './entities/questionnaire-template.entity';
import type { Question } from './entities/question.entity';
import type { QuestionOption } from './entities/question-option.entity';
import type { CandidateQuestionnaireResponse } from './entities/candidate-questionnaire-response.entity';
import type { CandidateSelectedOption } from './entities/candidate-selected-option.entity';

/**
 * Database Interfaces
 *
 * Defines contracts for database operations across the application.
 * Services depend on these, never on TypeORM, so that tests can swap in an
 * in-memory implementation.
 */

export type QuestionWithOptions = Omit<Question, 'options'> & { options: QuestionOption[] };
export type TemplateWithQuestions = Omit<QuestionnaireTemplate, 'questions'> & { questions: QuestionWithOptions[] };

export interface TemplateFilter {
    positionKey?: string;
}

export interface ResponseFilter {
    candidateId?: number;
    positionKey?: string;
    templateId?: number;
}

export type NewTemplate = Pick<QuestionnaireTemplate, 'position_key' | 'title' | 'description' | 'step_number' | 'version' | 'is_active'>;
export type TemplatePatch = Partial<NewTemplate>;

export type NewQuestion = Pick<Question, 'templateId' | 'question_text' | 'question_type' | 'points' | 'scoring_mode' | 'order'>;
export type QuestionPatch = Partial<Omit<NewQuestion, 'templateId'>>;

export type NewOption = Pick<QuestionOption, 'questionId' | 'option_text' | 'is_correct' | 'option_points' | 'order'>;
export type OptionPatch = Partial<Omit<NewOption, 'questionId'>>;

export type NewResponse = Pick<CandidateQuestionnaireResponse, 'candidateId' | 'templateId' | 'position_key' | 'score' | 'max_score'>;
export type NewSelection = Pick<CandidateSelectedOption, 'responseId' | 'questionId' | 'optionId'>;

export interface IQuestionnaireRepository {
    // Templates, ordered by position, step_number, title, id
    findTemplates(filter?: TemplateFilter): Promise<QuestionnaireTemplate[]>;
    findTemplate(id: number): Promise<QuestionnaireTemplate | null>;
    findTemplateWithQuestions(id: number): Promise<TemplateWithQuestions | null>;
    findActiveTemplates(positionKey: string): Promise<TemplateWithQuestions[]>;
    createTemplate(data: NewTemplate): Promise<QuestionnaireTemplate>;
    updateTemplate(id: number, patch: TemplatePatch): Promise<QuestionnaireTemplate>;
    deleteTemplate(id: number): Promise<void>;

    findQuestion(id: number): Promise<Question | null>;
    createQuestion(data: NewQuestion): Promise<Question>;
    updateQuestion(id: number, patch: QuestionPatch): Promise<Question>;
    deleteQuestion(id: number): Promise<void>;

    findOption(id: number): Promise<QuestionOption | null>;
    findOptionsByQuestion(questionId: number): Promise<QuestionOption[]>;
    createOption(data: NewOption): Promise<QuestionOption>;
    updateOption(id: number, patch: OptionPatch): Promise<QuestionOption>;
    deleteOption(id: number): Promise<void>;

    // Responses, newest submission first
    findResponse(id: number): Promise<CandidateQuestionnaireResponse | null>;
    findResponses(filter?: ResponseFilter): Promise<CandidateQuestionnaireResponse[]>;
    findResponseByCandidateAndTemplate(candidateId: number, templateId: number): Promise<CandidateQuestionnaireResponse | null>;
    createResponse(data: NewResponse): Promise<CandidateQuestionnaireResponse>;
    updateResponseScore(id: number, score: Decimal, maxScore: Decimal): Promise<void>;
    updateResponsePositionKey(templateId: number, positionKey: string): Promise<void>;
    // Removes the response together with its selections
    deleteResponse(id: number): Promise<void>;
    countResponsesForTemplate(templateId: number): Promise<number>;

    createSelections(rows: NewSelection[]): Promise<CandidateSelectedOption[]>;
    findSelectionsByResponse(responseId: number): Promise<CandidateSelectedOption[]>;
    findSelectionsByQuestion(questionId: number): Promise<CandidateSelectedOption[]>;
    countSelectionsForQuestion(questionId: number): Promise<number>;
    countSelectionsForOption(optionId: number): Promise<number>;
}

export interface IUnitOfWork {
    // Non-transactional access for reads
    readonly repository: IQuestionnaireRepository;
    // Runs work in one transaction; rolls back if it throws
    transaction<T>(work: (repository: IQuestionnaireRepository) => Promise<T>): Promise<T>;
}
