import { getEnv } from "../config/env";
import { logger } from "../config/logger";
import { AppDataSource } from "../db/data-source";
import { TypeOrmUnitOfWork } from "../db/questionnaire.repository";
import { buildServices } from "../container";
import { RecalculationSummary } from "../types/questionnaire";
import { parseTarget } from "./recalculation-target";

function failuresIn(summaries: RecalculationSummary[]): number {
    return summaries.reduce((total, summary) => total + summary.failed.length, 0);
}

async function main(): Promise<number> {
    const target = parseTarget(process.argv.slice(2));
    const env = getEnv();

    await AppDataSource.initialize();

    try {
        const { recalculation } = buildServices({
            unitOfWork: new TypeOrmUnitOfWork(AppDataSource, logger),
            logger,
            retry: { maxAttempts: env.RECALC_MAX_ATTEMPTS, baseDelay: env.RECALC_BACKOFF_MS },
            recalculationMode: "sync"
        });

        if (target.kind === "response") {
            const outcome = await recalculation.recalculateResponse(target.id);
            logger.info({ ...outcome }, "Response score recalculated");
            return 0;
        }

        const summaries = target.kind === "template"
            ? [await recalculation.recalculateForTemplate(target.id)]
            : await recalculation.recalculateAll();

        const failed = failuresIn(summaries);
        logger.info({
            templates: summaries.length,
            responses: summaries.reduce((total, summary) => total + summary.total, 0),
            changed: summaries.reduce((total, summary) => total + summary.changed, 0),
            failed
        }, "Score recalculation finished");

        return failed > 0 ? 1 : 0;
    } finally {
        await AppDataSource.destroy();
    }
}

main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, "Score recalculation failed");
        process.exit(1);
    });
