import { Decimal } from 'decimal.js';
import { vi } from 'vitest';
import type { ILogger } from '../../src/config/logger';
import type { TemplateWithQuestions } from '../../src/db/interfaces';
import type { QuestionType, ScorableQuestion, ScoringMode } from '../../src/types/questionnaire';
import { InMemoryUnitOfWork } from './in-memory-unit-of-work';

export function createStubLogger(): ILogger {
    return {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    };
}

export interface OptionSeed {
    text?: string;
    correct?: boolean;
    points?: Decimal.Value;
    order?: number;
}

export interface QuestionSeed {
    text?: string;
    type?: QuestionType;
    mode?: ScoringMode;
    points?: Decimal.Value;
    order?: number;
    options?: OptionSeed[];
}

export interface TemplateSeed {
    position?: string;
    title?: string;
    step?: number;
    active?: boolean;
    questions?: QuestionSeed[];
}

/**
 * Writes a template with its questions and options straight through the
 * repository and returns it as the resolver would load it.
 */
export async function seedTemplate(unitOfWork: InMemoryUnitOfWork, seed: TemplateSeed = {}): Promise<TemplateWithQuestions> {
    const repository = unitOfWork.repository;
    const template = await repository.createTemplate({
        position_key: seed.position ?? 'Pintor',
        title: seed.title ?? 'Painting basics',
        description: '',
        step_number: seed.step ?? 1,
        version: 1,
        is_active: seed.active ?? true
    });

    for (const [questionIndex, questionSeed] of (seed.questions ?? []).entries()) {
        const question = await repository.createQuestion({
            templateId: template.id,
            question_text: questionSeed.text ?? `Question ${questionIndex + 1}`,
            question_type: questionSeed.type ?? 'multi_select',
            scoring_mode: questionSeed.mode ?? 'all_or_nothing',
            points: new Decimal(questionSeed.points ?? 1),
            order: questionSeed.order ?? questionIndex
        });

        for (const [optionIndex, optionSeed] of (questionSeed.options ?? []).entries()) {
            await repository.createOption({
                questionId: question.id,
                option_text: optionSeed.text ?? `Option ${optionIndex + 1}`,
                is_correct: optionSeed.correct ?? false,
                option_points: new Decimal(optionSeed.points ?? 0),
                order: optionSeed.order ?? optionIndex
            });
        }
    }

    const loaded = await repository.findTemplateWithQuestions(template.id);
    if (!loaded) {
        throw new Error(`Seeded template ${template.id} vanished`);
    }
    return loaded;
}

/**
 * Scorable question with option ids 1..n in the order given.
 */
export function scorable(
    mode: ScoringMode,
    type: QuestionType,
    points: Decimal.Value,
    options: Array<{ correct?: boolean; points?: Decimal.Value }>
): ScorableQuestion {
    return {
        id: 100,
        question_type: type,
        scoring_mode: mode,
        points: new Decimal(points),
        options: options.map((option, index) => ({
            id: index + 1,
            is_correct: option.correct ?? false,
            option_points: new Decimal(option.points ?? 0)
        }))
    };
}

export function ids(...values: number[]): ReadonlySet<number> {
    return new Set(values);
}
