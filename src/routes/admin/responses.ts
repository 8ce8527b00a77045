import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../../container";
import {
    serializeBreakdown,
    serializeResponse,
    serializeSelections
} from "../../serializers/questionnaire.serializers";
import { idSchema, parseId, sendError } from "../route-helpers";

const listQuerySchema = z.object({
    candidate_id: idSchema.optional(),
    position_key: z.string().trim().min(1).optional(),
    template_id: idSchema.optional()
});

const recalculateSchema = z.union([
    z.object({ response_id: z.number().int().positive() }).strict(),
    z.object({ template_id: z.number().int().positive() }).strict(),
    z.object({}).strict()
]);

export function createAdminResponseRoutes(
    services: Pick<AppServices, 'responseRecorder' | 'recalculation' | 'logger'>
): Router {
    const router = Router();
    const { responseRecorder, recalculation, logger } = services;

    router.get('/', async (req: Request, res: Response) => {
        try {
            const query = listQuerySchema.parse(req.query);
            const responses = await responseRecorder.findResponses({
                candidateId: query.candidate_id,
                positionKey: query.position_key,
                templateId: query.template_id
            });
            res.json({ responses: responses.map(serializeResponse) });
        } catch (error) {
            sendError(res, error, logger, 'Failed to list responses');
        }
    });

    /**
     * POST /admin/responses/recalculate
     *
     * Body: { response_id } | { template_id } | {} for every template
     */
    router.post('/recalculate', async (req: Request, res: Response) => {
        try {
            const body = recalculateSchema.parse(req.body ?? {});

            if ('response_id' in body) {
                return res.json(await recalculation.recalculateResponse(body.response_id));
            }
            if ('template_id' in body) {
                return res.json(await recalculation.recalculateForTemplate(body.template_id));
            }
            res.json({ templates: await recalculation.recalculateAll() });
        } catch (error) {
            sendError(res, error, logger, 'Score recalculation failed');
        }
    });

    router.get('/:id', async (req: Request, res: Response) => {
        try {
            const detail = await responseRecorder.describeResponse(parseId(req.params.id));
            res.json({
                ...serializeResponse(detail.response),
                selections: serializeSelections(detail.selections),
                breakdown: serializeBreakdown(detail.breakdown)
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to load response');
        }
    });

    return router;
}
