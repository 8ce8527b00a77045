import type { JobsOptions } from 'bullmq';
import { ILogger } from '../config/logger';
import { RECALCULATE_TEMPLATE_JOB, RecalculationJobData } from '../queue/queue-config';
import { RecalculationSummary } from '../types/questionnaire';
import { IRecalculationService } from './recalculation.service';

export interface RecalculationRequest {
    templateId: number;
    templateVersion: number;
    reason: string;
}

export type RecalculationDispatch =
    | { mode: 'sync'; summary: RecalculationSummary }
    | { mode: 'queue'; job_id: string };

export interface IRecalculationDispatcher {
    dispatch(request: RecalculationRequest): Promise<RecalculationDispatch>;
}

// The slice of a BullMQ Queue the dispatcher needs
export interface IRecalculationQueue {
    add(name: string, data: RecalculationJobData, opts?: JobsOptions): Promise<{ id?: string }>;
}

export function recalculationJobId(request: RecalculationRequest): string {
    return `template-${request.templateId}-v${request.templateVersion}`;
}

/**
 * Re-scores in the caller's request, after the edit has committed.
 */
export class SyncRecalculationDispatcher implements IRecalculationDispatcher {
    constructor(
        private recalculation: IRecalculationService,
        private logger: ILogger
    ) { }

    async dispatch(request: RecalculationRequest): Promise<RecalculationDispatch> {
        this.logger.info({ ...request }, 'Running score recalculation');
        const summary = await this.recalculation.recalculateForTemplate(request.templateId);
        return { mode: 'sync', summary };
    }
}

/**
 * Hands the re-score to the BullMQ worker. Job ids carry the template
 * version, so repeated edits collapse into one job per version while a later
 * version always gets a fresh run against its own configuration.
 */
export class QueueRecalculationDispatcher implements IRecalculationDispatcher {
    constructor(
        private queue: IRecalculationQueue,
        private logger: ILogger
    ) { }

    async dispatch(request: RecalculationRequest): Promise<RecalculationDispatch> {
        const jobId = recalculationJobId(request);

        const job = await this.queue.add(RECALCULATE_TEMPLATE_JOB, {
            templateId: request.templateId,
            templateVersion: request.templateVersion,
            reason: request.reason
        }, { jobId });

        this.logger.info({
            ...request,
            jobId: job.id ?? jobId
        }, 'Score recalculation queued');

        return { mode: 'queue', job_id: job.id ?? jobId };
    }
}
