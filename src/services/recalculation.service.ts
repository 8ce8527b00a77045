import { ILogger } from '../config/logger';
import type { IUnitOfWork } from '../db/interfaces';
import { NotFoundError } from '../errors/questionnaire.errors';
import { RecalculationOutcome, RecalculationSummary } from '../types/questionnaire';
import { IRetryUtil, RetryUtil } from '../utils/retry.util';
import { computeScore, groupSelections } from './scoring.service';

export interface RecalculationOptions {
    maxAttempts: number;
    baseDelay: number;
}

export interface IRecalculationService {
    recalculateResponse(responseId: number): Promise<RecalculationOutcome>;
    recalculateForQuestion(questionId: number): Promise<RecalculationSummary>;
    recalculateForTemplate(templateId: number): Promise<RecalculationSummary>;
    recalculateAll(): Promise<RecalculationSummary[]>;
}

/**
 * Recalculation Service
 *
 * Re-scores stored responses against the template's current configuration.
 * Recorded selections are read, never written, so running it twice without
 * an edit in between leaves every score unchanged.
 */
export class RecalculationService implements IRecalculationService {
    constructor(
        private unitOfWork: IUnitOfWork,
        private logger: ILogger,
        private retryUtil: IRetryUtil = RetryUtil,
        private options: RecalculationOptions = { maxAttempts: 5, baseDelay: 1000 }
    ) { }

    async recalculateResponse(responseId: number): Promise<RecalculationOutcome> {
        return this.unitOfWork.transaction(async (repository) => {
            const response = await repository.findResponse(responseId);
            if (!response) {
                throw new NotFoundError('Response', responseId);
            }

            const template = await repository.findTemplateWithQuestions(response.templateId);
            if (!template) {
                throw new NotFoundError('Template', response.templateId);
            }

            const selections = await repository.findSelectionsByResponse(responseId);
            const result = computeScore(template.questions, groupSelections(selections));

            const changed = !result.score.equals(response.score) || !result.maxScore.equals(response.max_score);
            if (changed) {
                await repository.updateResponseScore(responseId, result.score, result.maxScore);
            }

            return {
                response_id: responseId,
                previous_score: response.score.toString(),
                score: result.score.toString(),
                max_score: result.maxScore.toString(),
                changed
            };
        });
    }

    async recalculateForQuestion(questionId: number): Promise<RecalculationSummary> {
        const question = await this.unitOfWork.repository.findQuestion(questionId);
        if (!question) {
            throw new NotFoundError('Question', questionId);
        }
        return this.recalculateForTemplate(question.templateId);
    }

    /**
     * Each response gets its own transaction and retry budget. A response
     * that still fails is reported in the summary and the run carries on.
     */
    async recalculateForTemplate(templateId: number): Promise<RecalculationSummary> {
        const repository = this.unitOfWork.repository;
        const template = await repository.findTemplate(templateId);
        if (!template) {
            throw new NotFoundError('Template', templateId);
        }

        const responses = await repository.findResponses({ templateId });
        const summary: RecalculationSummary = {
            template_id: templateId,
            total: responses.length,
            recalculated: 0,
            changed: 0,
            failed: []
        };

        for (const response of responses) {
            try {
                const outcome = await this.retryUtil.executeWithRetry(
                    () => this.recalculateResponse(response.id),
                    {
                        maxAttempts: this.options.maxAttempts,
                        baseDelay: this.options.baseDelay,
                        operationName: `score recalculation for response ${response.id}`
                    }
                );
                summary.recalculated++;
                if (outcome.changed) {
                    summary.changed++;
                }
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                summary.failed.push({ response_id: response.id, error: message });
                this.logger.error({
                    templateId,
                    responseId: response.id,
                    error: message
                }, 'Score recalculation failed for response');
            }
        }

        this.logger.info({
            templateId,
            templateVersion: template.version,
            total: summary.total,
            recalculated: summary.recalculated,
            changed: summary.changed,
            failed: summary.failed.length
        }, 'Template scores recalculated');

        return summary;
    }

    async recalculateAll(): Promise<RecalculationSummary[]> {
        const templates = await this.unitOfWork.repository.findTemplates();
        const summaries: RecalculationSummary[] = [];

        for (const template of templates) {
            summaries.push(await this.recalculateForTemplate(template.id));
        }

        return summaries;
    }
}
