import type { Job } from 'bullmq';
import { z } from 'zod';
import { ILogger } from '../config/logger';
import { RecalculationJobData } from '../queue/queue-config';
import { IRecalculationService } from '../services/recalculation.service';
import { RecalculationSummary } from '../types/questionnaire';

const jobDataSchema = z.object({
    templateId: z.number().int().positive(),
    templateVersion: z.number().int().positive(),
    reason: z.string()
});

// The parts of a BullMQ job the worker reads
export type RecalculationJob = Pick<Job<RecalculationJobData, RecalculationSummary>, 'id' | 'data' | 'attemptsMade'>;

export interface IRecalculationWorker {
    processRecalculation(job: RecalculationJob): Promise<RecalculationSummary>;
}

/**
 * Recalculation Worker
 *
 * Processes queued template re-scores. A run that leaves any response
 * unscored throws, so BullMQ retries the job with backoff; responses that
 * already succeeded come out unchanged on the next attempt.
 */
export class RecalculationWorker implements IRecalculationWorker {
    constructor(
        private recalculation: IRecalculationService,
        private logger: ILogger
    ) { }

    async processRecalculation(job: RecalculationJob): Promise<RecalculationSummary> {
        const data = jobDataSchema.parse(job.data);

        this.logger.info({
            workerJobId: job.id,
            attempt: job.attemptsMade + 1,
            ...data
        }, 'Starting score recalculation');

        const summary = await this.recalculation.recalculateForTemplate(data.templateId);

        if (summary.failed.length > 0) {
            this.logger.warn({
                workerJobId: job.id,
                templateId: data.templateId,
                failedResponseIds: summary.failed.map((failure) => failure.response_id)
            }, 'Score recalculation incomplete');
            throw new Error(
                `Recalculation of template ${data.templateId} failed for ${summary.failed.length} of ${summary.total} responses`
            );
        }

        return summary;
    }

    /**
     * Processor bound for QueueConfig.startWorker
     */
    processor(): (job: RecalculationJob) => Promise<RecalculationSummary> {
        return (job) => this.processRecalculation(job);
    }
}
