import { Decimal } from "decimal.js";
import { DataSource, EntityManager, FindOptionsWhere } from "typeorm";
import { QuestionnaireTemplate } from "./entities/questionnaire-template.entity";
import { Question } from "./entities/question.entity";
import { QuestionOption } from "./entities/question-option.entity";
import { CandidateQuestionnaireResponse } from "./entities/candidate-questionnaire-response.entity";
import { CandidateSelectedOption } from "./entities/candidate-selected-option.entity";
import { ILogger } from "../config/logger";
import {
    IQuestionnaireRepository,
    IUnitOfWork,
    NewOption,
    NewQuestion,
    NewResponse,
    NewSelection,
    NewTemplate,
    OptionPatch,
    QuestionPatch,
    ResponseFilter,
    TemplateFilter,
    TemplatePatch,
    TemplateWithQuestions
} from "./interfaces";

// Loaded relations come back optional on the entity; callers get plain arrays
function withQuestions(template: QuestionnaireTemplate): TemplateWithQuestions {
    return {
        ...template,
        questions: (template.questions ?? []).map((question) => ({
            ...question,
            options: question.options ?? []
        }))
    };
}

const TEMPLATE_ORDER = { step_number: "ASC", title: "ASC", id: "ASC" } as const;
const NESTED_QUESTION_ORDER = {
    questions: {
        order: "ASC",
        id: "ASC",
        options: { order: "ASC", id: "ASC" }
    }
} as const;

/**
 * TypeORM Questionnaire Repository
 *
 * Backed by an EntityManager, which is either the data source's default
 * manager or the manager of a transaction's QueryRunner.
 */
export class TypeOrmQuestionnaireRepository implements IQuestionnaireRepository {
    constructor(private manager: EntityManager) { }

    async findTemplates(filter: TemplateFilter = {}): Promise<QuestionnaireTemplate[]> {
        const where: FindOptionsWhere<QuestionnaireTemplate> = {};
        if (filter.positionKey !== undefined) {
            where.position_key = filter.positionKey;
        }
        return this.manager.find(QuestionnaireTemplate, {
            where,
            order: { position_key: "ASC", ...TEMPLATE_ORDER }
        });
    }

    async findTemplate(id: number): Promise<QuestionnaireTemplate | null> {
        return this.manager.findOne(QuestionnaireTemplate, { where: { id } });
    }

    async findTemplateWithQuestions(id: number): Promise<TemplateWithQuestions | null> {
        const template = await this.manager.findOne(QuestionnaireTemplate, {
            where: { id },
            relations: { questions: { options: true } },
            order: NESTED_QUESTION_ORDER
        });
        return template ? withQuestions(template) : null;
    }

    async findActiveTemplates(positionKey: string): Promise<TemplateWithQuestions[]> {
        const templates = await this.manager.find(QuestionnaireTemplate, {
            where: { position_key: positionKey, is_active: true },
            relations: { questions: { options: true } },
            order: { ...TEMPLATE_ORDER, ...NESTED_QUESTION_ORDER }
        });
        return templates.map(withQuestions);
    }

    async createTemplate(data: NewTemplate): Promise<QuestionnaireTemplate> {
        return this.manager.save(QuestionnaireTemplate, this.manager.create(QuestionnaireTemplate, data));
    }

    async updateTemplate(id: number, patch: TemplatePatch): Promise<QuestionnaireTemplate> {
        if (Object.keys(patch).length > 0) {
            await this.manager.update(QuestionnaireTemplate, { id }, patch);
        }
        return this.manager.findOneOrFail(QuestionnaireTemplate, { where: { id } });
    }

    async deleteTemplate(id: number): Promise<void> {
        await this.manager.delete(QuestionnaireTemplate, { id });
    }

    async findQuestion(id: number): Promise<Question | null> {
        return this.manager.findOne(Question, { where: { id } });
    }

    async createQuestion(data: NewQuestion): Promise<Question> {
        return this.manager.save(Question, this.manager.create(Question, data));
    }

    async updateQuestion(id: number, patch: QuestionPatch): Promise<Question> {
        if (Object.keys(patch).length > 0) {
            await this.manager.update(Question, { id }, patch);
        }
        return this.manager.findOneOrFail(Question, { where: { id } });
    }

    async deleteQuestion(id: number): Promise<void> {
        await this.manager.delete(Question, { id });
    }

    async findOption(id: number): Promise<QuestionOption | null> {
        return this.manager.findOne(QuestionOption, { where: { id } });
    }

    async findOptionsByQuestion(questionId: number): Promise<QuestionOption[]> {
        return this.manager.find(QuestionOption, {
            where: { questionId },
            order: { order: "ASC", id: "ASC" }
        });
    }

    async createOption(data: NewOption): Promise<QuestionOption> {
        return this.manager.save(QuestionOption, this.manager.create(QuestionOption, data));
    }

    async updateOption(id: number, patch: OptionPatch): Promise<QuestionOption> {
        if (Object.keys(patch).length > 0) {
            await this.manager.update(QuestionOption, { id }, patch);
        }
        return this.manager.findOneOrFail(QuestionOption, { where: { id } });
    }

    async deleteOption(id: number): Promise<void> {
        await this.manager.delete(QuestionOption, { id });
    }

    async findResponse(id: number): Promise<CandidateQuestionnaireResponse | null> {
        return this.manager.findOne(CandidateQuestionnaireResponse, { where: { id } });
    }

    async findResponses(filter: ResponseFilter = {}): Promise<CandidateQuestionnaireResponse[]> {
        const where: FindOptionsWhere<CandidateQuestionnaireResponse> = {};
        if (filter.candidateId !== undefined) {
            where.candidateId = filter.candidateId;
        }
        if (filter.positionKey !== undefined) {
            where.position_key = filter.positionKey;
        }
        if (filter.templateId !== undefined) {
            where.templateId = filter.templateId;
        }
        return this.manager.find(CandidateQuestionnaireResponse, {
            where,
            order: { submitted_at: "DESC", id: "DESC" }
        });
    }

    async findResponseByCandidateAndTemplate(candidateId: number, templateId: number): Promise<CandidateQuestionnaireResponse | null> {
        return this.manager.findOne(CandidateQuestionnaireResponse, { where: { candidateId, templateId } });
    }

    async createResponse(data: NewResponse): Promise<CandidateQuestionnaireResponse> {
        return this.manager.save(
            CandidateQuestionnaireResponse,
            this.manager.create(CandidateQuestionnaireResponse, data)
        );
    }

    async updateResponseScore(id: number, score: Decimal, maxScore: Decimal): Promise<void> {
        await this.manager.update(CandidateQuestionnaireResponse, { id }, { score, max_score: maxScore });
    }

    async updateResponsePositionKey(templateId: number, positionKey: string): Promise<void> {
        await this.manager.update(CandidateQuestionnaireResponse, { templateId }, { position_key: positionKey });
    }

    async deleteResponse(id: number): Promise<void> {
        // candidate_selected_options.response_id cascades
        await this.manager.delete(CandidateQuestionnaireResponse, { id });
    }

    async countResponsesForTemplate(templateId: number): Promise<number> {
        return this.manager.count(CandidateQuestionnaireResponse, { where: { templateId } });
    }

    async createSelections(rows: NewSelection[]): Promise<CandidateSelectedOption[]> {
        if (rows.length === 0) {
            return [];
        }
        return this.manager.save(
            CandidateSelectedOption,
            rows.map((row) => this.manager.create(CandidateSelectedOption, row))
        );
    }

    async findSelectionsByResponse(responseId: number): Promise<CandidateSelectedOption[]> {
        return this.manager.find(CandidateSelectedOption, {
            where: { responseId },
            order: { questionId: "ASC", optionId: "ASC" }
        });
    }

    async findSelectionsByQuestion(questionId: number): Promise<CandidateSelectedOption[]> {
        return this.manager.find(CandidateSelectedOption, { where: { questionId } });
    }

    async countSelectionsForQuestion(questionId: number): Promise<number> {
        return this.manager.count(CandidateSelectedOption, { where: { questionId } });
    }

    async countSelectionsForOption(optionId: number): Promise<number> {
        return this.manager.count(CandidateSelectedOption, { where: { optionId } });
    }
}

/**
 * TypeORM Unit of Work
 *
 * Runs a callback against a repository bound to a single QueryRunner
 * transaction. Commits when the callback resolves, rolls back when it throws.
 */
export class TypeOrmUnitOfWork implements IUnitOfWork {
    readonly repository: IQuestionnaireRepository;

    constructor(
        private dataSource: DataSource,
        private logger: ILogger
    ) {
        this.repository = new TypeOrmQuestionnaireRepository(dataSource.manager);
    }

    async transaction<T>(work: (repository: IQuestionnaireRepository) => Promise<T>): Promise<T> {
        const queryRunner = this.dataSource.createQueryRunner();
        await queryRunner.connect();
        await queryRunner.startTransaction();

        try {
            const result = await work(new TypeOrmQuestionnaireRepository(queryRunner.manager));

            await queryRunner.commitTransaction();

            return result;

        } catch (error) {
            await queryRunner.rollbackTransaction();

            this.logger.warn({
                error: error instanceof Error ? error.message : String(error)
            }, 'Transaction rolled back');

            throw error;
        } finally {
            await queryRunner.release();
        }
    }
}
