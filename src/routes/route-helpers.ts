import { Response } from "express";
import { z } from "zod";
import { ILogger } from "../config/logger";
import { QuestionnaireError } from "../errors/questionnaire.errors";

export const idSchema = z.coerce.number().int().positive();

export function parseId(value: string): number {
    return idSchema.parse(value);
}

/**
 * Maps a thrown error onto the JSON error body the routes share.
 */
export function sendError(res: Response, error: unknown, logger: ILogger, failure: string): Response {
    if (error instanceof z.ZodError) {
        return res.status(400).json({
            error: 'Validation failed',
            details: error.errors
        });
    }

    if (error instanceof QuestionnaireError) {
        return res.status(error.statusCode).json(error.toJSON());
    }

    logger.error({
        error: error instanceof Error ? error.message : 'Unknown error'
    }, failure);

    return res.status(500).json({
        error: failure,
        message: error instanceof Error ? error.message : 'Unknown error'
    });
}
