import { Decimal } from 'decimal.js';
import {
    QuestionLintWarning,
    QuestionScore,
    ScorableOption,
    ScorableQuestion,
    ScoreResult,
    SelectionMap
} from '../types/questionnaire';

/**
 * Scoring Service
 *
 * Pure functions: no I/O, no clock. The same question configuration and the
 * same recorded selections always produce the same Decimal, which is what
 * makes re-scoring idempotent.
 *
 * Every mode yields a contribution between 0 and the question's points.
 * Degenerate configurations (no options, no correct option, weighted with no
 * option_points) contribute 0 rather than failing.
 */

const ZERO = new Decimal(0);
const ONE = new Decimal(1);
const HUNDRED = new Decimal(100);

function assertNever(value: never): never {
    throw new Error(`Unhandled scoring mode: ${String(value)}`);
}

function sum(values: Decimal[]): Decimal {
    return values.reduce((total, value) => total.plus(value), ZERO);
}

function max(values: Decimal[]): Decimal {
    return values.reduce((best, value) => (value.greaterThan(best) ? value : best), ZERO);
}

// Selections are matched against the question's own options only
function chosenOptions(question: ScorableQuestion, selected: ReadonlySet<number>): ScorableOption[] {
    return question.options.filter((option) => selected.has(option.id));
}

function scoreAllOrNothing(question: ScorableQuestion, selected: ReadonlySet<number>): Decimal {
    const correctIds = question.options.filter((option) => option.is_correct).map((option) => option.id);
    if (correctIds.length === 0) {
        return ZERO;
    }

    const chosen = chosenOptions(question, selected);
    const exactMatch = chosen.length === correctIds.length
        && chosen.every((option) => option.is_correct);

    return exactMatch ? question.points : ZERO;
}

/**
 * Credit for the share of the correct options' weight that was selected.
 * A correct option weighs its option_points when any correct option carries
 * points, otherwise every correct option weighs 1. Incorrect selections
 * neither add nor subtract.
 */
function scorePartial(question: ScorableQuestion, selected: ReadonlySet<number>): Decimal {
    const correct = question.options.filter((option) => option.is_correct);
    if (correct.length === 0) {
        return ZERO;
    }

    const usePoints = correct.some((option) => option.option_points.greaterThan(ZERO));
    const weightOf = (option: ScorableOption): Decimal => (usePoints ? option.option_points : ONE);
    const chosenCorrect = chosenOptions(question, selected).filter((option) => option.is_correct);

    if (question.question_type === 'single_select') {
        const chosen = chosenCorrect[0];
        if (!chosen) {
            return ZERO;
        }
        return question.points.times(weightOf(chosen)).div(max(correct.map(weightOf)));
    }

    return question.points.times(sum(chosenCorrect.map(weightOf))).div(sum(correct.map(weightOf)));
}

function scoreWeighted(question: ScorableQuestion, selected: ReadonlySet<number>): Decimal {
    const chosen = chosenOptions(question, selected);
    const allPoints = question.options.map((option) => option.option_points);

    if (question.question_type === 'single_select') {
        const maxPoints = max(allPoints);
        const pick = chosen[0];
        if (!pick || maxPoints.isZero()) {
            return ZERO;
        }
        return question.points.times(pick.option_points).div(maxPoints);
    }

    const totalPoints = sum(allPoints);
    if (totalPoints.isZero()) {
        return ZERO;
    }
    return question.points.times(sum(chosen.map((option) => option.option_points))).div(totalPoints);
}

export function scoreQuestion(question: ScorableQuestion, selected: ReadonlySet<number>): Decimal {
    switch (question.scoring_mode) {
        case 'all_or_nothing':
            return scoreAllOrNothing(question, selected);
        case 'partial':
            return scorePartial(question, selected);
        case 'weighted':
            return scoreWeighted(question, selected);
        default:
            return assertNever(question.scoring_mode);
    }
}

/**
 * Score a whole template submission.
 *
 * max_score is the sum of every question's points whether or not the
 * candidate answered it; unanswered questions contribute 0.
 */
export function computeScore(questions: ScorableQuestion[], selections: SelectionMap): ScoreResult {
    const breakdown: QuestionScore[] = questions.map((question) => {
        const selected = selections.get(question.id) ?? new Set<number>();
        return {
            questionId: question.id,
            scoringMode: question.scoring_mode,
            selectedOptionIds: [...selected].sort((a, b) => a - b),
            earned: scoreQuestion(question, selected),
            possible: question.points
        };
    });

    const score = sum(breakdown.map((entry) => entry.earned));
    const maxScore = sum(questions.map((question) => question.points));

    return { score, maxScore, percentage: percentageOf(score, maxScore), breakdown };
}

export function percentageOf(score: Decimal, maxScore: Decimal): Decimal {
    return maxScore.isZero() ? ZERO : score.times(HUNDRED).div(maxScore);
}

export function groupSelections(rows: Array<{ questionId: number; optionId: number }>): SelectionMap {
    const grouped = new Map<number, Set<number>>();
    for (const row of rows) {
        const bucket = grouped.get(row.questionId) ?? new Set<number>();
        bucket.add(row.optionId);
        grouped.set(row.questionId, bucket);
    }
    return grouped;
}

/**
 * Administrator-facing warnings for questions that can never yield a nonzero
 * score. Scoring itself never rejects these.
 */
export function lintQuestion(question: ScorableQuestion): QuestionLintWarning[] {
    if (question.options.length === 0) {
        return [{ questionId: question.id, code: 'no_options', message: 'Question has no options and always scores 0' }];
    }

    const warnings: QuestionLintWarning[] = [];
    const correctCount = question.options.filter((option) => option.is_correct).length;

    if (question.scoring_mode === 'weighted') {
        if (question.options.every((option) => option.option_points.isZero())) {
            warnings.push({
                questionId: question.id,
                code: 'weighted_without_points',
                message: 'Weighted question has no option with option_points > 0 and always scores 0'
            });
        }
        return warnings;
    }

    if (correctCount === 0) {
        warnings.push({
            questionId: question.id,
            code: 'no_correct_option',
            message: 'Question has no correct option and always scores 0'
        });
    }

    if (question.scoring_mode === 'all_or_nothing' && question.question_type === 'single_select' && correctCount > 1) {
        warnings.push({
            questionId: question.id,
            code: 'single_select_multiple_correct',
            message: 'Single-select question marks several options correct; an exact match is impossible'
        });
    }

    return warnings;
}
