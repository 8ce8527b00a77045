/**
 * Questionnaire error taxonomy
 *
 * Each error carries the HTTP status the routes answer with. Degenerate
 * scoring configurations have no error class: they score zero and surface
 * as lint warnings instead.
 */
export abstract class QuestionnaireError extends Error {
    abstract readonly statusCode: number;
    abstract readonly code: string;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    toJSON(): Record<string, unknown> {
        return { error: this.code, message: this.message };
    }
}

// Malformed template, question or option rejected at write time
export class ConfigurationError extends QuestionnaireError {
    readonly statusCode = 400;
    readonly code = 'configuration_error';

    constructor(message: string, readonly field?: string) {
        super(message);
    }

    toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), field: this.field ?? null };
    }
}

// Submitted answers that do not fit the target template
export class ValidationError extends QuestionnaireError {
    readonly statusCode = 400;
    readonly code = 'validation_error';

    constructor(message: string, readonly questionId: number, readonly optionId?: number) {
        super(message);
    }

    toJSON(): Record<string, unknown> {
        return {
            ...super.toJSON(),
            question_id: this.questionId,
            option_id: this.optionId ?? null
        };
    }
}

export class NotFoundError extends QuestionnaireError {
    readonly statusCode = 404;
    readonly code = 'not_found';

    constructor(readonly resource: string, readonly id: number) {
        super(`${resource} ${id} not found`);
    }
}

export class ConflictError extends QuestionnaireError {
    readonly statusCode = 409;
    readonly code = 'conflict';
}

// Postgres unique_violation, surfaced by pg and TypeORM's QueryFailedError as `code`
export function isUniqueViolation(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}
