import { Router } from "express";
import type { AppServices } from "../../container";
import { requireAdminToken } from "../../middlewares/admin-auth";
import { createAdminAnalyticsRoutes } from "./analytics";
import { createAdminOptionRoutes, createAdminQuestionRoutes } from "./questions";
import { createAdminResponseRoutes } from "./responses";
import { createAdminTemplateRoutes } from "./templates";

export function createAdminRoutes(services: AppServices, adminToken: string): Router {
    const router = Router();

    router.use(requireAdminToken(adminToken, services.logger));

    router.use("/templates", createAdminTemplateRoutes(services));
    router.use("/questions", createAdminQuestionRoutes(services));
    router.use("/options", createAdminOptionRoutes(services));
    router.use("/responses", createAdminResponseRoutes(services));
    router.use("/analytics", createAdminAnalyticsRoutes(services));

    return router;
}
