import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../../container";
import { idSchema, sendError } from "../route-helpers";

const byPositionQuerySchema = z.object({
    position_key: z.string().trim().min(1).optional()
});

const distributionQuerySchema = z.object({
    question_id: idSchema
});

export function createAdminAnalyticsRoutes(services: Pick<AppServices, 'analytics' | 'logger'>): Router {
    const router = Router();
    const { analytics, logger } = services;

    router.get('/by-position', async (req: Request, res: Response) => {
        try {
            const { position_key } = byPositionQuerySchema.parse(req.query);
            res.json({ templates: await analytics.statsByPosition(position_key) });
        } catch (error) {
            sendError(res, error, logger, 'Failed to load position statistics');
        }
    });

    router.get('/option-distribution', async (req: Request, res: Response) => {
        try {
            const { question_id } = distributionQuerySchema.parse(req.query);
            res.json({
                question_id,
                options: await analytics.optionDistribution(question_id)
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to load option distribution');
        }
    });

    return router;
}
