import { getEnv } from "./config/env";
import { logger } from "./config/logger";
import { AppDataSource } from "./db/data-source";
import { TypeOrmUnitOfWork } from "./db/questionnaire.repository";
import { createApp } from "./app";
import { AppServices, buildServices } from "./container";
import { QueueConfig } from "./queue/queue-config";
import { RecalculationWorker } from "./workers/recalculation-worker";

// Initialize database and start server
async function startServer() {
    const env = getEnv();

    await AppDataSource.initialize();
    logger.info({ migrations: AppDataSource.migrations.length }, "Database connection established");

    const unitOfWork = new TypeOrmUnitOfWork(AppDataSource, logger);
    const retry = { maxAttempts: env.RECALC_MAX_ATTEMPTS, baseDelay: env.RECALC_BACKOFF_MS };

    let services: AppServices;
    let queueConfig: QueueConfig | null = null;

    if (env.RECALCULATION_MODE === "queue") {
        queueConfig = new QueueConfig({
            redisUrl: env.REDIS_URL,
            maxAttempts: env.RECALC_MAX_ATTEMPTS,
            backoffMs: env.RECALC_BACKOFF_MS
        });
        services = buildServices({
            unitOfWork,
            logger,
            retry,
            recalculationMode: "queue",
            queue: queueConfig.getRecalculationQueue()
        });
        const worker = new RecalculationWorker(services.recalculation, logger);
        queueConfig.startWorker(worker.processor());
        logger.info({ redisUrl: env.REDIS_URL }, "Recalculation queue initialized and worker started");
    } else {
        services = buildServices({ unitOfWork, logger, retry, recalculationMode: "sync" });
        logger.info({}, "Score recalculation runs synchronously after each edit");
    }

    const app = createApp(services, { adminToken: env.ADMIN_API_TOKEN });

    const server = app.listen(env.PORT, () => {
        logger.info({ port: env.PORT, recalculationMode: env.RECALCULATION_MODE }, `Server running at http://localhost:${env.PORT}`);
    });

    const shutdown = async (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close();
        await queueConfig?.close();
        await AppDataSource.destroy();
        process.exit(0);
    };

    for (const signal of ["SIGTERM", "SIGINT"] as const) {
        process.once(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                logger.error({ error: error instanceof Error ? error.message : String(error) }, "Shutdown failed");
                process.exit(1);
            });
        });
    }
}

startServer().catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, "Failed to start server");
    process.exit(1);
});
