import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../../container";
import { serializeOption, serializeQuestion } from "../../serializers/questionnaire.serializers";
import { QUESTION_TYPES, SCORING_MODES } from "../../types/questionnaire";
import { parseId, sendError } from "../route-helpers";

// Decimals may arrive as JSON numbers or as strings such as "2.50"
const amountSchema = z.union([
    z.number().nonnegative(),
    z.string().regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal")
]);

const createQuestionSchema = z.object({
    template_id: z.number().int().positive(),
    question_text: z.string().min(1),
    question_type: z.enum(QUESTION_TYPES).optional(),
    points: amountSchema.optional(),
    scoring_mode: z.enum(SCORING_MODES).optional(),
    order: z.number().int().nonnegative().optional()
});

const updateQuestionSchema = createQuestionSchema.omit({ template_id: true }).partial();

const createOptionSchema = z.object({
    question_id: z.number().int().positive(),
    option_text: z.string().min(1).max(500),
    is_correct: z.boolean().optional(),
    option_points: amountSchema.optional(),
    order: z.number().int().nonnegative().optional()
});

const updateOptionSchema = createOptionSchema.omit({ question_id: true }).partial();

/**
 * Question routes. Creating, deleting, or changing a question's points,
 * type or scoring mode re-scores the template's stored responses.
 */
export function createAdminQuestionRoutes(services: Pick<AppServices, 'admin' | 'logger'>): Router {
    const router = Router();
    const { admin, logger } = services;

    router.post('/', async (req: Request, res: Response) => {
        try {
            const result = await admin.createQuestion(createQuestionSchema.parse(req.body));
            res.status(201).json({
                question: serializeQuestion(result.entity),
                template_version: result.template_version,
                recalculation: result.recalculation
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to create question');
        }
    });

    router.patch('/:id', async (req: Request, res: Response) => {
        try {
            const id = parseId(req.params.id);
            const result = await admin.updateQuestion(id, updateQuestionSchema.parse(req.body));
            res.json({
                question: serializeQuestion(result.entity),
                template_version: result.template_version,
                recalculation: result.recalculation
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to update question');
        }
    });

    router.delete('/:id', async (req: Request, res: Response) => {
        try {
            const result = await admin.deleteQuestion(parseId(req.params.id));
            res.json({
                deleted: result.entity.id,
                template_version: result.template_version,
                recalculation: result.recalculation
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to delete question');
        }
    });

    return router;
}

/**
 * Option routes. Changes to is_correct or option_points, and adding or
 * removing an option, re-score the template's stored responses.
 */
export function createAdminOptionRoutes(services: Pick<AppServices, 'admin' | 'logger'>): Router {
    const router = Router();
    const { admin, logger } = services;

    router.post('/', async (req: Request, res: Response) => {
        try {
            const result = await admin.createOption(createOptionSchema.parse(req.body));
            res.status(201).json({
                option: serializeOption(result.entity),
                template_version: result.template_version,
                recalculation: result.recalculation
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to create option');
        }
    });

    router.patch('/:id', async (req: Request, res: Response) => {
        try {
            const id = parseId(req.params.id);
            const result = await admin.updateOption(id, updateOptionSchema.parse(req.body));
            res.json({
                option: serializeOption(result.entity),
                template_version: result.template_version,
                recalculation: result.recalculation
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to update option');
        }
    });

    router.delete('/:id', async (req: Request, res: Response) => {
        try {
            const result = await admin.deleteOption(parseId(req.params.id));
            res.json({
                deleted: result.entity.id,
                template_version: result.template_version,
                recalculation: result.recalculation
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to delete option');
        }
    });

    return router;
}
