import { Decimal } from 'decimal.js';
import type { CandidateQuestionnaireResponse } from '../db/entities/candidate-questionnaire-response.entity';
import type { QuestionnaireTemplate } from '../db/entities/questionnaire-template.entity';
import type { IUnitOfWork } from '../db/interfaces';
import { NotFoundError } from '../errors/questionnaire.errors';
import { toDisplay } from '../serializers/questionnaire.serializers';
import { percentageOf } from './scoring.service';

export interface TemplateStats {
    template_id: number;
    total_responses: number;
    average_score: number;
    average_max_score: number;
    average_percentage: number;
}

export interface PositionTemplateStats extends TemplateStats {
    position_key: string;
    template_title: string;
    step_number: number;
}

export interface OptionSelectionCount {
    option_id: number;
    option_text: string;
    is_correct: boolean;
    order: number;
    selection_count: number;
}

function mean(values: Decimal[]): Decimal {
    if (values.length === 0) {
        return new Decimal(0);
    }
    return values.reduce((total, value) => total.plus(value), new Decimal(0)).div(values.length);
}

function summarize(templateId: number, responses: CandidateQuestionnaireResponse[]): TemplateStats {
    return {
        template_id: templateId,
        total_responses: responses.length,
        average_score: toDisplay(mean(responses.map((response) => response.score))),
        average_max_score: toDisplay(mean(responses.map((response) => response.max_score))),
        average_percentage: toDisplay(mean(responses.map((response) => percentageOf(response.score, response.max_score))))
    };
}

function compareTemplates(a: QuestionnaireTemplate, b: QuestionnaireTemplate): number {
    if (a.step_number !== b.step_number) {
        return a.step_number - b.step_number;
    }
    if (a.title !== b.title) {
        return a.title < b.title ? -1 : 1;
    }
    return a.id - b.id;
}

/**
 * Analytics Service
 *
 * Read-only aggregates over stored scores and selections.
 */
export class AnalyticsService {
    constructor(private unitOfWork: IUnitOfWork) { }

    async templateStats(templateId: number): Promise<TemplateStats> {
        const repository = this.unitOfWork.repository;
        const template = await repository.findTemplate(templateId);
        if (!template) {
            throw new NotFoundError('Template', templateId);
        }

        return summarize(templateId, await repository.findResponses({ templateId }));
    }

    /**
     * One row per (position, template) that has responses. Responses are
     * grouped by the position recorded at submission time.
     */
    async statsByPosition(positionKey?: string): Promise<PositionTemplateStats[]> {
        const repository = this.unitOfWork.repository;
        const [templates, responses] = await Promise.all([
            repository.findTemplates(),
            repository.findResponses(positionKey === undefined ? {} : { positionKey })
        ]);
        const templatesById = new Map(templates.map((template) => [template.id, template]));

        const groups = new Map<string, { positionKey: string; template: QuestionnaireTemplate; responses: CandidateQuestionnaireResponse[] }>();
        for (const response of responses) {
            const template = templatesById.get(response.templateId);
            if (!template) {
                continue;
            }
            const key = `${response.position_key}\u0000${template.id}`;
            const group = groups.get(key) ?? { positionKey: response.position_key, template, responses: [] };
            group.responses.push(response);
            groups.set(key, group);
        }

        return [...groups.values()]
            .sort((a, b) => {
                if (a.positionKey !== b.positionKey) {
                    return a.positionKey < b.positionKey ? -1 : 1;
                }
                return compareTemplates(a.template, b.template);
            })
            .map((group) => ({
                position_key: group.positionKey,
                template_title: group.template.title,
                step_number: group.template.step_number,
                ...summarize(group.template.id, group.responses)
            }));
    }

    /**
     * Selection counts per option, most selected first. Options nobody chose
     * are listed with a count of 0.
     */
    async optionDistribution(questionId: number): Promise<OptionSelectionCount[]> {
        const repository = this.unitOfWork.repository;
        const question = await repository.findQuestion(questionId);
        if (!question) {
            throw new NotFoundError('Question', questionId);
        }

        const [options, selections] = await Promise.all([
            repository.findOptionsByQuestion(questionId),
            repository.findSelectionsByQuestion(questionId)
        ]);

        const counts = new Map<number, number>();
        for (const selection of selections) {
            counts.set(selection.optionId, (counts.get(selection.optionId) ?? 0) + 1);
        }

        return options
            .map((option) => ({
                option_id: option.id,
                option_text: option.option_text,
                is_correct: option.is_correct,
                order: option.order,
                selection_count: counts.get(option.id) ?? 0
            }))
            .sort((a, b) => b.selection_count - a.selection_count || a.order - b.order || a.option_id - b.option_id);
    }
}
