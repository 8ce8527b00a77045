import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../container";
import { idSchema, sendError } from "./route-helpers";

const stepsQuerySchema = z.object({
    position_key: z.string().trim().min(1, "position_key is required")
});

const progressQuerySchema = z.object({
    candidate_id: idSchema,
    position_key: z.string().trim().min(1, "position_key is required")
});

export function createQuestionnaireRoutes(services: Pick<AppServices, 'stepResolver' | 'logger'>): Router {
    const router = Router();
    const { stepResolver, logger } = services;

    /**
     * GET /questionnaires/steps?position_key=
     *
     * Active questionnaire steps for a position, in the order a candidate
     * takes them. Correct answers and scoring configuration are left out.
     */
    router.get('/steps', async (req: Request, res: Response) => {
        try {
            const { position_key } = stepsQuerySchema.parse(req.query);
            res.json(await stepResolver.resolveSteps(position_key));
        } catch (error) {
            sendError(res, error, logger, 'Failed to load questionnaire steps');
        }
    });

    /**
     * GET /questionnaires/progress?candidate_id=&position_key=
     */
    router.get('/progress', async (req: Request, res: Response) => {
        try {
            const { candidate_id, position_key } = progressQuerySchema.parse(req.query);
            res.json(await stepResolver.getProgress(candidate_id, position_key));
        } catch (error) {
            sendError(res, error, logger, 'Failed to load questionnaire progress');
        }
    });

    return router;
}
