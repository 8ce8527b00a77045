import { Decimal } from 'decimal.js';
import { ILogger } from '../config/logger';
import type { QuestionnaireTemplate } from '../db/entities/questionnaire-template.entity';
import type { Question } from '../db/entities/question.entity';
import type { QuestionOption } from '../db/entities/question-option.entity';
import type {
    IQuestionnaireRepository,
    IUnitOfWork,
    OptionPatch,
    QuestionPatch,
    TemplatePatch,
    TemplateWithQuestions
} from '../db/interfaces';
import { ConfigurationError, ConflictError, NotFoundError } from '../errors/questionnaire.errors';
import {
    QUESTION_TYPES,
    QuestionLintWarning,
    QuestionType,
    SCORING_MODES,
    ScoringMode
} from '../types/questionnaire';
import { IRecalculationDispatcher, RecalculationDispatch } from './recalculation.dispatcher';
import { lintQuestion } from './scoring.service';

export interface TemplateInput {
    position_key: string;
    title: string;
    description?: string;
    step_number?: number;
    is_active?: boolean;
}

export interface TemplateUpdateInput {
    position_key?: string;
    title?: string;
    description?: string;
    step_number?: number;
}

export interface QuestionInput {
    template_id: number;
    question_text: string;
    question_type?: string;
    points?: Decimal.Value;
    scoring_mode?: string;
    order?: number;
}

export type QuestionUpdateInput = Partial<Omit<QuestionInput, 'template_id'>>;

export interface OptionInput {
    question_id: number;
    option_text: string;
    is_correct?: boolean;
    option_points?: Decimal.Value;
    order?: number;
}

export type OptionUpdateInput = Partial<Omit<OptionInput, 'question_id'>>;

export type RecalculationState = RecalculationDispatch | { mode: 'failed'; error: string };

export interface ScoringEditResult<T> {
    entity: T;
    template_version: number;
    recalculation: RecalculationState | null;
}

export interface TemplateDetail {
    template: TemplateWithQuestions;
    warnings: QuestionLintWarning[];
}

export interface TemplateDeletion {
    id: number;
    deleted: boolean;
    deactivated: boolean;
}

// numeric(7,2) and numeric(9,2)
const MAX_QUESTION_POINTS = new Decimal('99999.99');
const MAX_OPTION_POINTS = new Decimal('9999999.99');

function requireText(value: string, field: string, maxLength?: number): string {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
        throw new ConfigurationError(`${field} must not be blank`, field);
    }
    if (maxLength !== undefined && trimmed.length > maxLength) {
        throw new ConfigurationError(`${field} must be at most ${maxLength} characters`, field);
    }
    return trimmed;
}

function requireInteger(value: number, field: string, min: number): number {
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigurationError(`${field} must be an integer >= ${min}`, field);
    }
    return value;
}

function requireAmount(value: Decimal.Value, field: string, upperBound: Decimal): Decimal {
    let amount: Decimal;
    try {
        amount = new Decimal(value);
    } catch {
        throw new ConfigurationError(`${field} must be a decimal number`, field);
    }
    if (!amount.isFinite() || amount.lessThan(0) || amount.greaterThan(upperBound)) {
        throw new ConfigurationError(`${field} must be between 0 and ${upperBound.toString()}`, field);
    }
    if (amount.decimalPlaces() > 2) {
        throw new ConfigurationError(`${field} allows at most two decimal places`, field);
    }
    return amount;
}

function requireQuestionType(value: string): QuestionType {
    const match = QUESTION_TYPES.find((type) => type === value);
    if (!match) {
        throw new ConfigurationError(`question_type must be one of ${QUESTION_TYPES.join(', ')}`, 'question_type');
    }
    return match;
}

function requireScoringMode(value: string): ScoringMode {
    const match = SCORING_MODES.find((mode) => mode === value);
    if (!match) {
        throw new ConfigurationError(`scoring_mode must be one of ${SCORING_MODES.join(', ')}`, 'scoring_mode');
    }
    return match;
}

function questionPatchFrom(input: QuestionUpdateInput): QuestionPatch {
    const patch: QuestionPatch = {};
    if (input.question_text !== undefined) patch.question_text = requireText(input.question_text, 'question_text');
    if (input.question_type !== undefined) patch.question_type = requireQuestionType(input.question_type);
    if (input.points !== undefined) patch.points = requireAmount(input.points, 'points', MAX_QUESTION_POINTS);
    if (input.scoring_mode !== undefined) patch.scoring_mode = requireScoringMode(input.scoring_mode);
    if (input.order !== undefined) patch.order = requireInteger(input.order, 'order', 0);
    return patch;
}

function optionPatchFrom(input: OptionUpdateInput): OptionPatch {
    const patch: OptionPatch = {};
    if (input.option_text !== undefined) patch.option_text = requireText(input.option_text, 'option_text', 500);
    if (input.is_correct !== undefined) patch.is_correct = input.is_correct;
    if (input.option_points !== undefined) {
        patch.option_points = requireAmount(input.option_points, 'option_points', MAX_OPTION_POINTS);
    }
    if (input.order !== undefined) patch.order = requireInteger(input.order, 'order', 0);
    return patch;
}

function questionScoringChanged(before: Question, patch: QuestionPatch): boolean {
    return (patch.points !== undefined && !patch.points.equals(before.points))
        || (patch.scoring_mode !== undefined && patch.scoring_mode !== before.scoring_mode)
        || (patch.question_type !== undefined && patch.question_type !== before.question_type);
}

function optionScoringChanged(before: QuestionOption, patch: OptionPatch): boolean {
    return (patch.is_correct !== undefined && patch.is_correct !== before.is_correct)
        || (patch.option_points !== undefined && !patch.option_points.equals(before.option_points));
}

interface TemplateState {
    templateId: number;
    templateVersion: number;
    hasResponses: boolean;
    scoringChanged: boolean;
}

/**
 * Questionnaire Admin Service
 *
 * Configuration writes for templates, questions and options. Edits that can
 * move a score bump the template version and, once committed, trigger a
 * re-score of the template's stored responses. Text and order edits do not.
 */
export class QuestionnaireAdminService {
    constructor(
        private unitOfWork: IUnitOfWork,
        private dispatcher: IRecalculationDispatcher,
        private logger: ILogger
    ) { }

    // Templates

    async listTemplates(positionKey?: string): Promise<QuestionnaireTemplate[]> {
        return this.unitOfWork.repository.findTemplates(positionKey === undefined ? {} : { positionKey });
    }

    async getTemplate(id: number): Promise<TemplateDetail> {
        const template = await this.unitOfWork.repository.findTemplateWithQuestions(id);
        if (!template) {
            throw new NotFoundError('Template', id);
        }
        return { template, warnings: template.questions.flatMap(lintQuestion) };
    }

    async createTemplate(input: TemplateInput): Promise<QuestionnaireTemplate> {
        const template = await this.unitOfWork.repository.createTemplate({
            position_key: requireText(input.position_key, 'position_key', 200),
            title: requireText(input.title, 'title', 255),
            description: input.description ?? '',
            step_number: requireInteger(input.step_number ?? 1, 'step_number', 1),
            version: 1,
            is_active: input.is_active ?? false
        });

        this.logger.info({
            templateId: template.id,
            positionKey: template.position_key,
            stepNumber: template.step_number
        }, 'Questionnaire template created');

        return template;
    }

    async updateTemplate(id: number, input: TemplateUpdateInput): Promise<QuestionnaireTemplate> {
        const patch: TemplatePatch = {};
        if (input.position_key !== undefined) patch.position_key = requireText(input.position_key, 'position_key', 200);
        if (input.title !== undefined) patch.title = requireText(input.title, 'title', 255);
        if (input.description !== undefined) patch.description = input.description;
        if (input.step_number !== undefined) patch.step_number = requireInteger(input.step_number, 'step_number', 1);

        return this.patchTemplate(id, patch);
    }

    async activate(id: number): Promise<QuestionnaireTemplate> {
        return this.patchTemplate(id, { is_active: true });
    }

    async deactivate(id: number): Promise<QuestionnaireTemplate> {
        return this.patchTemplate(id, { is_active: false });
    }

    async updateStep(id: number, stepNumber: number): Promise<QuestionnaireTemplate> {
        return this.patchTemplate(id, { step_number: requireInteger(stepNumber, 'step_number', 1) });
    }

    /**
     * Templates with responses are kept for their scores and only deactivated.
     */
    async deleteTemplate(id: number): Promise<TemplateDeletion> {
        const deletion = await this.unitOfWork.transaction(async (repository) => {
            await this.requireTemplate(repository, id);

            if (await repository.countResponsesForTemplate(id) > 0) {
                await repository.updateTemplate(id, { is_active: false });
                return { id, deleted: false, deactivated: true };
            }

            await repository.deleteTemplate(id);
            return { id, deleted: true, deactivated: false };
        });

        this.logger.info({ templateId: id, ...deletion }, 'Questionnaire template removed');
        return deletion;
    }

    // Questions

    async createQuestion(input: QuestionInput): Promise<ScoringEditResult<Question>> {
        const data = {
            question_text: requireText(input.question_text, 'question_text'),
            question_type: requireQuestionType(input.question_type ?? 'multi_select'),
            points: requireAmount(input.points ?? 1, 'points', MAX_QUESTION_POINTS),
            scoring_mode: requireScoringMode(input.scoring_mode ?? 'all_or_nothing'),
            order: requireInteger(input.order ?? 0, 'order', 0)
        };

        const { entity, pending } = await this.unitOfWork.transaction(async (repository) => {
            await this.requireTemplate(repository, input.template_id);
            const question = await repository.createQuestion({ templateId: input.template_id, ...data });
            return { entity: question, pending: await this.settleTemplate(repository, input.template_id, true) };
        });

        return this.finishScoringEdit(entity, pending, `question ${entity.id} created`);
    }

    async updateQuestion(id: number, input: QuestionUpdateInput): Promise<ScoringEditResult<Question>> {
        const patch = questionPatchFrom(input);

        const { entity, pending } = await this.unitOfWork.transaction(async (repository) => {
            const before = await repository.findQuestion(id);
            if (!before) {
                throw new NotFoundError('Question', id);
            }
            const question = await repository.updateQuestion(id, patch);
            const pending = await this.settleTemplate(
                repository,
                question.templateId,
                questionScoringChanged(before, patch)
            );
            return { entity: question, pending };
        });

        return this.finishScoringEdit(entity, pending, `question ${id} updated`);
    }

    async deleteQuestion(id: number): Promise<ScoringEditResult<{ id: number }>> {
        const { pending } = await this.unitOfWork.transaction(async (repository) => {
            const question = await repository.findQuestion(id);
            if (!question) {
                throw new NotFoundError('Question', id);
            }
            if (await repository.countSelectionsForQuestion(id) > 0) {
                throw new ConflictError(`Question ${id} has recorded selections and cannot be deleted`);
            }
            await repository.deleteQuestion(id);
            return { pending: await this.settleTemplate(repository, question.templateId, true) };
        });

        return this.finishScoringEdit({ id }, pending, `question ${id} deleted`);
    }

    // Options

    async createOption(input: OptionInput): Promise<ScoringEditResult<QuestionOption>> {
        const data = {
            option_text: requireText(input.option_text, 'option_text', 500),
            is_correct: input.is_correct ?? false,
            option_points: requireAmount(input.option_points ?? 0, 'option_points', MAX_OPTION_POINTS),
            order: requireInteger(input.order ?? 0, 'order', 0)
        };

        const { entity, pending } = await this.unitOfWork.transaction(async (repository) => {
            const question = await repository.findQuestion(input.question_id);
            if (!question) {
                throw new NotFoundError('Question', input.question_id);
            }
            const option = await repository.createOption({ questionId: question.id, ...data });
            return { entity: option, pending: await this.settleTemplate(repository, question.templateId, true) };
        });

        return this.finishScoringEdit(entity, pending, `option ${entity.id} created`);
    }

    async updateOption(id: number, input: OptionUpdateInput): Promise<ScoringEditResult<QuestionOption>> {
        const patch = optionPatchFrom(input);

        const { entity, pending } = await this.unitOfWork.transaction(async (repository) => {
            const before = await repository.findOption(id);
            if (!before) {
                throw new NotFoundError('Option', id);
            }
            const option = await repository.updateOption(id, patch);
            const question = await repository.findQuestion(option.questionId);
            if (!question) {
                throw new NotFoundError('Question', option.questionId);
            }
            const pending = await this.settleTemplate(
                repository,
                question.templateId,
                optionScoringChanged(before, patch)
            );
            return { entity: option, pending };
        });

        return this.finishScoringEdit(entity, pending, `option ${id} updated`);
    }

    async deleteOption(id: number): Promise<ScoringEditResult<{ id: number }>> {
        const { pending } = await this.unitOfWork.transaction(async (repository) => {
            const option = await repository.findOption(id);
            if (!option) {
                throw new NotFoundError('Option', id);
            }
            if (await repository.countSelectionsForOption(id) > 0) {
                throw new ConflictError(`Option ${id} has recorded selections and cannot be deleted`);
            }
            const question = await repository.findQuestion(option.questionId);
            if (!question) {
                throw new NotFoundError('Question', option.questionId);
            }
            await repository.deleteOption(id);
            return { pending: await this.settleTemplate(repository, question.templateId, true) };
        });

        return this.finishScoringEdit({ id }, pending, `option ${id} deleted`);
    }

    private async patchTemplate(id: number, patch: TemplatePatch): Promise<QuestionnaireTemplate> {
        const template = await this.unitOfWork.transaction(async (repository) => {
            await this.requireTemplate(repository, id);
            const updated = await repository.updateTemplate(id, patch);
            // Responses carry a copy of the position key
            if (patch.position_key !== undefined) {
                await repository.updateResponsePositionKey(id, patch.position_key);
            }
            return updated;
        });

        this.logger.info({ templateId: id, fields: Object.keys(patch) }, 'Questionnaire template updated');
        return template;
    }

    private async requireTemplate(repository: IQuestionnaireRepository, id: number): Promise<QuestionnaireTemplate> {
        const template = await repository.findTemplate(id);
        if (!template) {
            throw new NotFoundError('Template', id);
        }
        return template;
    }

    // Bumps the version when the edit can move a score
    private async settleTemplate(
        repository: IQuestionnaireRepository,
        templateId: number,
        scoringChanged: boolean
    ): Promise<TemplateState> {
        let template = await this.requireTemplate(repository, templateId);
        if (scoringChanged) {
            template = await repository.updateTemplate(templateId, { version: template.version + 1 });
        }
        return {
            templateId,
            templateVersion: template.version,
            hasResponses: await repository.countResponsesForTemplate(templateId) > 0,
            scoringChanged
        };
    }

    /**
     * Runs after commit. A failed dispatch leaves the edit in place and is
     * reported back so the caller can re-run recalculation by hand.
     */
    private async finishScoringEdit<T>(
        entity: T,
        pending: TemplateState,
        reason: string
    ): Promise<ScoringEditResult<T>> {
        if (!pending.scoringChanged) {
            return { entity, template_version: pending.templateVersion, recalculation: null };
        }

        this.logger.info({
            templateId: pending.templateId,
            templateVersion: pending.templateVersion,
            reason
        }, 'Scoring configuration changed');

        if (!pending.hasResponses) {
            return { entity, template_version: pending.templateVersion, recalculation: null };
        }

        let recalculation: RecalculationState;
        try {
            recalculation = await this.dispatcher.dispatch({
                templateId: pending.templateId,
                templateVersion: pending.templateVersion,
                reason
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error({
                templateId: pending.templateId,
                templateVersion: pending.templateVersion,
                error: message
            }, 'Score recalculation dispatch failed');
            recalculation = { mode: 'failed', error: message };
        }

        return { entity, template_version: pending.templateVersion, recalculation };
    }
}
