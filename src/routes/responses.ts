import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../container";
import { serializeResponse } from "../serializers/questionnaire.serializers";
import { sendError } from "./route-helpers";

const submitSchema = z.object({
    candidate_id: z.number().int().positive("candidate_id must be a positive integer"),
    template_id: z.number().int().positive("template_id must be a positive integer"),
    answers: z.array(z.object({
        question_id: z.number().int().positive(),
        selected_option_ids: z.array(z.number().int().positive())
    }))
});

export function createResponseRoutes(services: Pick<AppServices, 'responseRecorder' | 'logger'>): Router {
    const router = Router();
    const { responseRecorder, logger } = services;

    /**
     * POST /responses/submit
     *
     * Record and score a candidate's answers to one template. Submitting
     * the same template again replaces the earlier response. The per-question
     * breakdown stays on the admin side: it would reveal the answer key.
     *
     * Body: { candidate_id, template_id, answers: [{ question_id, selected_option_ids }] }
     * Returns: 201 { response, progress, replaced_response_id }
     */
    router.post('/submit', async (req: Request, res: Response) => {
        try {
            const body = submitSchema.parse(req.body);

            const result = await responseRecorder.submit(
                body.candidate_id,
                body.template_id,
                body.answers.map((answer) => ({
                    questionId: answer.question_id,
                    selectedOptionIds: answer.selected_option_ids
                }))
            );

            res.status(201).json({
                response: serializeResponse(result.response),
                progress: result.progress,
                replaced_response_id: result.replacedResponseId
            });
        } catch (error) {
            sendError(res, error, logger, 'Failed to record questionnaire response');
        }
    });

    return router;
}
