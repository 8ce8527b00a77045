import express, { Express, NextFunction, Request, Response } from "express";
import type { AppServices } from "./container";
import { createAdminRoutes } from "./routes/admin";
import { createQuestionnaireRoutes } from "./routes/questionnaires";
import { createResponseRoutes } from "./routes/responses";

export interface AppOptions {
    adminToken: string;
}

export function createApp(services: AppServices, options: AppOptions): Express {
    const app = express();

    // Middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/questionnaires", createQuestionnaireRoutes(services));
    app.use("/responses", createResponseRoutes(services));
    app.use("/admin", createAdminRoutes(services, options.adminToken));

    // Health check
    app.get("/health", (_req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (_req: Request, res: Response) => {
        res.json({
            message: "Questionnaire Scoring API",
            version: "1.0.0",
            endpoints: {
                "Candidates": {
                    "GET /questionnaires/steps?position_key=": "Active questionnaire steps for a position",
                    "GET /questionnaires/progress?candidate_id=&position_key=": "Steps completed by a candidate",
                    "POST /responses/submit": "Record and score answers to one step"
                },
                "Administration (x-admin-token)": {
                    "/admin/templates": "Templates, step order, activation, statistics",
                    "/admin/questions": "Questions and scoring modes",
                    "/admin/options": "Options, correctness and points",
                    "/admin/responses": "Stored responses and score recalculation",
                    "/admin/analytics": "Aggregates by position and option"
                },
                "System": {
                    "GET /health": "Health check"
                }
            }
        });
    });

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: "Not found" });
    });

    // Malformed JSON bodies and anything a route let through
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: "Malformed JSON body" });
            return;
        }

        services.logger.error({
            error: error instanceof Error ? error.message : String(error)
        }, "Unhandled request error");
        res.status(500).json({ error: "Internal server error" });
    });

    return app;
}
