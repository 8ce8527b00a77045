import { ILogger } from '../config/logger';
import type { IUnitOfWork, TemplateWithQuestions } from '../db/interfaces';
import {
    AdminTemplateView,
    PublicTemplateView,
    serializeAdminTemplate,
    serializePublicTemplate
} from '../serializers/questionnaire.serializers';
import { StepProgress } from '../types/questionnaire';
import { lintQuestion } from './scoring.service';

export interface StepList<T> {
    position_key: string;
    total_steps: number;
    steps: T[];
}

export interface IStepResolverService {
    resolveSteps(positionKey: string): Promise<StepList<PublicTemplateView>>;
    resolveStepsForAdmin(positionKey: string): Promise<StepList<AdminTemplateView>>;
    getProgress(candidateId: number, positionKey: string): Promise<StepProgress>;
}

function byOrderThenId(a: { order: number; id: number }, b: { order: number; id: number }): number {
    return a.order - b.order || a.id - b.id;
}

function compareSteps(a: TemplateWithQuestions, b: TemplateWithQuestions): number {
    if (a.step_number !== b.step_number) {
        return a.step_number - b.step_number;
    }
    if (a.title !== b.title) {
        return a.title < b.title ? -1 : 1;
    }
    return a.id - b.id;
}

// Steps by step_number, ties broken by title then id; questions and options by order then id
function orderSteps(templates: TemplateWithQuestions[]): TemplateWithQuestions[] {
    return [...templates].sort(compareSteps).map((template) => ({
        ...template,
        questions: [...template.questions].sort(byOrderThenId).map((question) => ({
            ...question,
            options: [...question.options].sort(byOrderThenId)
        }))
    }));
}

/**
 * Step Resolver Service
 *
 * Builds the ordered sequence of active questionnaire steps for a position
 * and reports how far a candidate has got through it.
 */
export class StepResolverService implements IStepResolverService {
    constructor(
        private unitOfWork: IUnitOfWork,
        private logger: ILogger
    ) { }

    async resolveSteps(positionKey: string): Promise<StepList<PublicTemplateView>> {
        const templates = await this.loadActiveSteps(positionKey);

        return {
            position_key: positionKey,
            total_steps: templates.length,
            steps: templates.map(serializePublicTemplate)
        };
    }

    /**
     * Same sequence with scoring configuration and lint warnings attached.
     */
    async resolveStepsForAdmin(positionKey: string): Promise<StepList<AdminTemplateView>> {
        const templates = await this.loadActiveSteps(positionKey);

        return {
            position_key: positionKey,
            total_steps: templates.length,
            steps: templates.map((template) =>
                serializeAdminTemplate(template, template.questions.flatMap(lintQuestion))
            )
        };
    }

    async getProgress(candidateId: number, positionKey: string): Promise<StepProgress> {
        const repository = this.unitOfWork.repository;
        const [templates, responses] = await Promise.all([
            this.loadActiveSteps(positionKey),
            repository.findResponses({ candidateId, positionKey })
        ]);

        const answered = new Set(responses.map((response) => response.templateId));
        const pending = templates.filter((template) => !answered.has(template.id));

        return {
            total_steps: templates.length,
            completed_steps: templates.length - pending.length,
            is_complete: pending.length === 0,
            pending_template_ids: pending.map((template) => template.id)
        };
    }

    private async loadActiveSteps(positionKey: string): Promise<TemplateWithQuestions[]> {
        const templates = orderSteps(await this.unitOfWork.repository.findActiveTemplates(positionKey));

        this.logger.debug({
            positionKey,
            templateIds: templates.map((template) => template.id)
        }, 'Resolved questionnaire steps');

        return templates;
    }
}
