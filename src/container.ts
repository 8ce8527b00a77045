import { ILogger } from './config/logger';
import type { IUnitOfWork } from './db/interfaces';
import { AnalyticsService } from './services/analytics.service';
import { QuestionnaireAdminService } from './services/questionnaire-admin.service';
import {
    IRecalculationDispatcher,
    IRecalculationQueue,
    QueueRecalculationDispatcher,
    SyncRecalculationDispatcher
} from './services/recalculation.dispatcher';
import { RecalculationService } from './services/recalculation.service';
import { ResponseRecorderService } from './services/response-recorder.service';
import { StepResolverService } from './services/step-resolver.service';
import { IRetryUtil, RetryUtil } from './utils/retry.util';

export interface AppServices {
    logger: ILogger;
    stepResolver: StepResolverService;
    responseRecorder: ResponseRecorderService;
    recalculation: RecalculationService;
    dispatcher: IRecalculationDispatcher;
    admin: QuestionnaireAdminService;
    analytics: AnalyticsService;
}

export type ServiceOptions = {
    unitOfWork: IUnitOfWork;
    logger: ILogger;
    retry?: { maxAttempts: number; baseDelay: number };
    retryUtil?: IRetryUtil;
} & (
    | { recalculationMode: 'sync' }
    | { recalculationMode: 'queue'; queue: IRecalculationQueue }
);

/**
 * Wires every service against one unit of work. Nothing here touches
 * TypeORM or Redis directly, so tests build the same graph over fakes.
 */
export function buildServices(options: ServiceOptions): AppServices {
    const { unitOfWork, logger } = options;

    const recalculation = new RecalculationService(
        unitOfWork,
        logger,
        options.retryUtil ?? RetryUtil,
        options.retry ?? { maxAttempts: 5, baseDelay: 1000 }
    );

    const dispatcher: IRecalculationDispatcher = options.recalculationMode === 'queue'
        ? new QueueRecalculationDispatcher(options.queue, logger)
        : new SyncRecalculationDispatcher(recalculation, logger);

    const stepResolver = new StepResolverService(unitOfWork, logger);

    return {
        logger,
        stepResolver,
        responseRecorder: new ResponseRecorderService(unitOfWork, stepResolver, logger),
        recalculation,
        dispatcher,
        admin: new QuestionnaireAdminService(unitOfWork, dispatcher, logger),
        analytics: new AnalyticsService(unitOfWork)
    };
}
