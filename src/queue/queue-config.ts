import { Processor, Queue, QueueEvents, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { ILogger, logger as defaultLogger } from '../config/logger';
import { RecalculationSummary } from '../types/questionnaire';

export const RECALCULATION_QUEUE = 'score-recalculation';
export const RECALCULATE_TEMPLATE_JOB = 'recalculate-template';

export interface RecalculationJobData {
    templateId: number;
    templateVersion: number;
    reason: string;
}

export interface QueueSettings {
    redisUrl: string;
    maxAttempts: number;
    backoffMs: number;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for score recalculation. Jobs are deduplicated per template
 * version, retried with exponential backoff and processed one at a time.
 */
export class QueueConfig {
    private redis: Redis;
    private recalculationQueue: Queue<RecalculationJobData, RecalculationSummary>;
    private recalculationWorker: Worker<RecalculationJobData, RecalculationSummary> | null = null;
    private queueEvents: QueueEvents;

    constructor(
        settings: QueueSettings,
        private logger: ILogger = defaultLogger
    ) {
        // Redis connection
        this.redis = new Redis(settings.redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.recalculationQueue = new Queue<RecalculationJobData, RecalculationSummary>(RECALCULATION_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 50,
                removeOnFail: 20,
                attempts: settings.maxAttempts,
                backoff: {
                    type: 'exponential',
                    delay: settings.backoffMs,
                },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(RECALCULATION_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    getRecalculationQueue(): Queue<RecalculationJobData, RecalculationSummary> {
        return this.recalculationQueue;
    }

    /**
     * Start the recalculation worker
     */
    startWorker(processor: Processor<RecalculationJobData, RecalculationSummary>): Worker<RecalculationJobData, RecalculationSummary> {
        const worker = new Worker<RecalculationJobData, RecalculationSummary>(RECALCULATION_QUEUE, processor, {
            connection: this.redis,
            concurrency: 1, // One template at a time
        });

        worker.on('completed', (job, result) => {
            this.logger.info({
                jobId: job.id,
                templateId: job.data.templateId,
                changed: result.changed,
                duration: job.processedOn === undefined ? null : Date.now() - job.processedOn
            }, 'Recalculation job completed');
        });

        worker.on('failed', (job, err) => {
            this.logger.error({
                jobId: job?.id,
                templateId: job?.data.templateId,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Recalculation job failed');
        });

        worker.on('stalled', (jobId) => {
            this.logger.warn({ jobId }, 'Recalculation job stalled');
        });

        this.recalculationWorker = worker;
        return worker;
    }

    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            this.logger.debug({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            this.logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            this.logger.error({ jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close all connections
     */
    async close() {
        await this.recalculationWorker?.close();
        await this.recalculationQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}
