import { ILogger } from '../config/logger';
import type { CandidateQuestionnaireResponse } from '../db/entities/candidate-questionnaire-response.entity';
import type { CandidateSelectedOption } from '../db/entities/candidate-selected-option.entity';
import type { IUnitOfWork, NewSelection, ResponseFilter, TemplateWithQuestions } from '../db/interfaces';
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from '../errors/questionnaire.errors';
import { AnswerInput, QuestionScore, SelectionMap, StepProgress } from '../types/questionnaire';
import { computeScore, groupSelections } from './scoring.service';
import { IStepResolverService } from './step-resolver.service';

export interface SubmissionResult {
    response: CandidateQuestionnaireResponse;
    breakdown: QuestionScore[];
    progress: StepProgress;
    replacedResponseId: number | null;
}

export interface ResponseDetail {
    response: CandidateQuestionnaireResponse;
    selections: CandidateSelectedOption[];
    breakdown: QuestionScore[];
}

export interface IResponseRecorderService {
    submit(candidateId: number, templateId: number, answers: AnswerInput[]): Promise<SubmissionResult>;
    findResponses(filter: ResponseFilter): Promise<CandidateQuestionnaireResponse[]>;
    describeResponse(responseId: number): Promise<ResponseDetail>;
}

/**
 * Check a submission against its template and collapse it into a selection
 * map. Throws ValidationError for the first answer that does not fit.
 */
export function validateAnswers(template: TemplateWithQuestions, answers: AnswerInput[]): SelectionMap {
    const questions = new Map(template.questions.map((question) => [question.id, question]));
    const selections = new Map<number, ReadonlySet<number>>();

    for (const answer of answers) {
        const question = questions.get(answer.questionId);
        if (!question) {
            throw new ValidationError(
                `Question ${answer.questionId} does not belong to template ${template.id}`,
                answer.questionId
            );
        }
        if (selections.has(question.id)) {
            throw new ValidationError(`Question ${question.id} is answered more than once`, question.id);
        }

        const optionIds = new Set(question.options.map((option) => option.id));
        const chosen = new Set(answer.selectedOptionIds);
        for (const optionId of chosen) {
            if (!optionIds.has(optionId)) {
                throw new ValidationError(
                    `Option ${optionId} does not belong to question ${question.id}`,
                    question.id,
                    optionId
                );
            }
        }

        if (question.question_type === 'single_select' && chosen.size > 1) {
            throw new ValidationError(
                `Question ${question.id} accepts a single option but received ${chosen.size}`,
                question.id
            );
        }

        selections.set(question.id, chosen);
    }

    return selections;
}

/**
 * Response Recorder Service
 *
 * Persists a candidate's answers to one template and scores them. A
 * resubmission replaces the earlier response for the same template.
 */
export class ResponseRecorderService implements IResponseRecorderService {
    constructor(
        private unitOfWork: IUnitOfWork,
        private stepResolver: IStepResolverService,
        private logger: ILogger
    ) { }

    async submit(candidateId: number, templateId: number, answers: AnswerInput[]): Promise<SubmissionResult> {
        const recorded = await this.record(candidateId, templateId, answers).catch((error: unknown) => {
            // A concurrent submission for the same step committed first
            if (isUniqueViolation(error)) {
                this.logger.warn({ candidateId, templateId }, 'Concurrent questionnaire submission rejected');
                throw new ConflictError(
                    `A response from candidate ${candidateId} to template ${templateId} was recorded concurrently; submit again`
                );
            }
            throw error;
        });

        const progress = await this.stepResolver.getProgress(candidateId, recorded.response.position_key);

        this.logger.info({
            candidateId,
            templateId,
            responseId: recorded.response.id,
            replacedResponseId: recorded.replacedResponseId,
            score: recorded.response.score.toString(),
            maxScore: recorded.response.max_score.toString(),
            completedSteps: progress.completed_steps,
            totalSteps: progress.total_steps
        }, 'Questionnaire response recorded');

        return { ...recorded, progress };
    }

    private async record(
        candidateId: number,
        templateId: number,
        answers: AnswerInput[]
    ): Promise<Omit<SubmissionResult, 'progress'>> {
        return this.unitOfWork.transaction(async (repository) => {
            const template = await repository.findTemplateWithQuestions(templateId);
            if (!template) {
                throw new NotFoundError('Template', templateId);
            }

            const selections = validateAnswers(template, answers);

            const previous = await repository.findResponseByCandidateAndTemplate(candidateId, templateId);
            if (previous) {
                await repository.deleteResponse(previous.id);
            }

            const result = computeScore(template.questions, selections);

            const response = await repository.createResponse({
                candidateId,
                templateId,
                position_key: template.position_key,
                score: result.score,
                max_score: result.maxScore
            });

            const rows: NewSelection[] = [];
            for (const [questionId, optionIds] of selections) {
                for (const optionId of optionIds) {
                    rows.push({ responseId: response.id, questionId, optionId });
                }
            }
            await repository.createSelections(rows);

            return {
                response,
                breakdown: result.breakdown,
                replacedResponseId: previous ? previous.id : null
            };
        });
    }

    async findResponses(filter: ResponseFilter): Promise<CandidateQuestionnaireResponse[]> {
        return this.unitOfWork.repository.findResponses(filter);
    }

    /**
     * The stored response with its selections. The breakdown is computed
     * against the template as currently configured.
     */
    async describeResponse(responseId: number): Promise<ResponseDetail> {
        const repository = this.unitOfWork.repository;
        const response = await repository.findResponse(responseId);
        if (!response) {
            throw new NotFoundError('Response', responseId);
        }

        const [template, selections] = await Promise.all([
            repository.findTemplateWithQuestions(response.templateId),
            repository.findSelectionsByResponse(responseId)
        ]);
        if (!template) {
            throw new NotFoundError('Template', response.templateId);
        }

        const { breakdown } = computeScore(template.questions, groupSelections(selections));
        return { response, selections, breakdown };
    }
}
