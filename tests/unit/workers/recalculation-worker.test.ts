import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { RecalculationJobData } from '../../../src/queue/queue-config';
import type { IRecalculationService } from '../../../src/services/recalculation.service';
import type { RecalculationSummary } from '../../../src/types/questionnaire';
import { RecalculationJob, RecalculationWorker } from '../../../src/workers/recalculation-worker';
import { createStubLogger } from '../../support/fixtures';

function fakeJob(data: RecalculationJobData): RecalculationJob {
    return {
        id: `template-${data.templateId}-v${data.templateVersion}`,
        data,
        attemptsMade: 0
    };
}

describe('RecalculationWorker', () => {
    let recalculateForTemplate: Mock<IRecalculationService['recalculateForTemplate']>;
    let worker: RecalculationWorker;

    beforeEach(() => {
        recalculateForTemplate = vi.fn<IRecalculationService['recalculateForTemplate']>();
        const recalculation: IRecalculationService = {
            recalculateResponse: vi.fn(),
            recalculateForQuestion: vi.fn(),
            recalculateForTemplate,
            recalculateAll: vi.fn()
        };
        worker = new RecalculationWorker(recalculation, createStubLogger());
    });

    it('re-scores the template named by the job', async () => {
        const summary: RecalculationSummary = { template_id: 3, total: 4, recalculated: 4, changed: 2, failed: [] };
        recalculateForTemplate.mockResolvedValue(summary);

        const result = await worker.processRecalculation(fakeJob({ templateId: 3, templateVersion: 5, reason: 'question 8 updated' }));

        expect(recalculateForTemplate).toHaveBeenCalledWith(3);
        expect(result).toEqual(summary);
    });

    it('fails the job when any response could not be re-scored', async () => {
        recalculateForTemplate.mockResolvedValue({
            template_id: 3,
            total: 4,
            recalculated: 3,
            changed: 1,
            failed: [{ response_id: 12, error: 'row is locked' }]
        });

        await expect(worker.processRecalculation(fakeJob({ templateId: 3, templateVersion: 5, reason: 'edit' })))
            .rejects.toThrow('Recalculation of template 3 failed for 1 of 4 responses');
    });

    it('rejects malformed job data', async () => {
        await expect(worker.processRecalculation(fakeJob({ templateId: 0, templateVersion: 1, reason: 'edit' })))
            .rejects.toThrow();
        expect(recalculateForTemplate).not.toHaveBeenCalled();
    });

    it('exposes a processor bound to the worker', async () => {
        recalculateForTemplate.mockResolvedValue({ template_id: 1, total: 0, recalculated: 0, changed: 0, failed: [] });

        const processor = worker.processor();
        await processor(fakeJob({ templateId: 1, templateVersion: 2, reason: 'edit' }));

        expect(recalculateForTemplate).toHaveBeenCalledWith(1);
    });
});
