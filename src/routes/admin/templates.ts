import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../../container";
import {
    serializeAdminTemplate,
    serializeTemplateSummary
} from "../../serializers/questionnaire.serializers";
import { parseId, sendError } from "../route-helpers";

const listQuerySchema = z.object({
    position_key: z.string().trim().min(1).optional()
});

const stepsQuerySchema = z.object({
    position_key: z.string().trim().min(1, "position_key is required")
});

const createTemplateSchema = z.object({
    position_key: z.string().min(1).max(200),
    title: z.string().min(1).max(255),
    description: z.string().optional(),
    step_number: z.number().int().min(1).optional(),
    is_active: z.boolean().optional()
});

const updateTemplateSchema = z.object({
    position_key: z.string().min(1).max(200).optional(),
    title: z.string().min(1).max(255).optional(),
    description: z.string().optional(),
    step_number: z.number().int().min(1).optional()
});

const stepSchema = z.object({
    step_number: z.number().int().min(1)
});

export function createAdminTemplateRoutes(
    services: Pick<AppServices, 'admin' | 'stepResolver' | 'analytics' | 'logger'>
): Router {
    const router = Router();
    const { admin, stepResolver, analytics, logger } = services;

    router.get('/', async (req: Request, res: Response) => {
        try {
            const { position_key } = listQuerySchema.parse(req.query);
            const templates = await admin.listTemplates(position_key);
            res.json({ templates: templates.map(serializeTemplateSummary) });
        } catch (error) {
            sendError(res, error, logger, 'Failed to list templates');
        }
    });

    /**
     * GET /admin/templates/steps?position_key=
     *
     * The candidate-facing step sequence with scoring configuration and
     * lint warnings attached.
     */
    router.get('/steps', async (req: Request, res: Response) => {
        try {
            const { position_key } = stepsQuerySchema.parse(req.query);
            res.json(await stepResolver.resolveStepsForAdmin(position_key));
        } catch (error) {
            sendError(res, error, logger, 'Failed to load questionnaire steps');
        }
    });

    router.post('/', async (req: Request, res: Response) => {
        try {
            const body = createTemplateSchema.parse(req.body);
            const template = await admin.createTemplate(body);
            res.status(201).json(serializeTemplateSummary(template));
        } catch (error) {
            sendError(res, error, logger, 'Failed to create template');
        }
    });

    router.get('/:id', async (req: Request, res: Response) => {
        try {
            const { template, warnings } = await admin.getTemplate(parseId(req.params.id));
            res.json(serializeAdminTemplate(template, warnings));
        } catch (error) {
            sendError(res, error, logger, 'Failed to load template');
        }
    });

    router.patch('/:id', async (req: Request, res: Response) => {
        try {
            const id = parseId(req.params.id);
            const body = updateTemplateSchema.parse(req.body);
            res.json(serializeTemplateSummary(await admin.updateTemplate(id, body)));
        } catch (error) {
            sendError(res, error, logger, 'Failed to update template');
        }
    });

    /**
     * DELETE /admin/templates/:id
     *
     * Templates that already have responses are deactivated instead.
     */
    router.delete('/:id', async (req: Request, res: Response) => {
        try {
            res.json(await admin.deleteTemplate(parseId(req.params.id)));
        } catch (error) {
            sendError(res, error, logger, 'Failed to delete template');
        }
    });

    router.post('/:id/activate', async (req: Request, res: Response) => {
        try {
            res.json(serializeTemplateSummary(await admin.activate(parseId(req.params.id))));
        } catch (error) {
            sendError(res, error, logger, 'Failed to activate template');
        }
    });

    router.post('/:id/deactivate', async (req: Request, res: Response) => {
        try {
            res.json(serializeTemplateSummary(await admin.deactivate(parseId(req.params.id))));
        } catch (error) {
            sendError(res, error, logger, 'Failed to deactivate template');
        }
    });

    router.patch('/:id/step', async (req: Request, res: Response) => {
        try {
            const id = parseId(req.params.id);
            const { step_number } = stepSchema.parse(req.body);
            res.json(serializeTemplateSummary(await admin.updateStep(id, step_number)));
        } catch (error) {
            sendError(res, error, logger, 'Failed to update template step');
        }
    });

    router.get('/:id/stats', async (req: Request, res: Response) => {
        try {
            res.json(await analytics.templateStats(parseId(req.params.id)));
        } catch (error) {
            sendError(res, error, logger, 'Failed to load template statistics');
        }
    });

    return router;
}
