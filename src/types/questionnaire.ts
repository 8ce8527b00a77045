import type { Decimal } from 'decimal.js';

/**
 * Questionnaire domain types
 *
 * Shared by the scorer, the recorder and the HTTP layer. Persisted shapes live
 * in the entities under src/db/entities; the types here describe values that
 * flow between services.
 */

export const QUESTION_TYPES = ['single_select', 'multi_select'] as const;
export type QuestionType = typeof QUESTION_TYPES[number];

export const SCORING_MODES = ['all_or_nothing', 'partial', 'weighted'] as const;
export type ScoringMode = typeof SCORING_MODES[number];

// One candidate answer as received from the form
export interface AnswerInput {
    questionId: number;
    selectedOptionIds: number[];
}

export interface ScorableOption {
    id: number;
    is_correct: boolean;
    option_points: Decimal;
}

export interface ScorableQuestion {
    id: number;
    question_type: QuestionType;
    scoring_mode: ScoringMode;
    points: Decimal;
    options: ScorableOption[];
}

// Selected option ids keyed by question id
export type SelectionMap = Map<number, ReadonlySet<number>>;

export interface QuestionScore {
    questionId: number;
    scoringMode: ScoringMode;
    selectedOptionIds: number[];
    earned: Decimal;
    possible: Decimal;
}

export interface ScoreResult {
    score: Decimal;
    maxScore: Decimal;
    percentage: Decimal;
    breakdown: QuestionScore[];
}

export type LintCode =
    | 'no_options'
    | 'no_correct_option'
    | 'weighted_without_points'
    | 'single_select_multiple_correct';

export interface QuestionLintWarning {
    questionId: number;
    code: LintCode;
    message: string;
}

export interface StepProgress {
    total_steps: number;
    completed_steps: number;
    is_complete: boolean;
    pending_template_ids: number[];
}

export interface RecalculationOutcome {
    response_id: number;
    previous_score: string;
    score: string;
    max_score: string;
    changed: boolean;
}

export interface RecalculationFailure {
    response_id: number;
    error: string;
}

export interface RecalculationSummary {
    template_id: number;
    total: number;
    recalculated: number;
    changed: number;
    failed: RecalculationFailure[];
}
