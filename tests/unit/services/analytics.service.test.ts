import { describe, it, expect, beforeEach } from 'vitest';
import type { TemplateWithQuestions } from '../../../src/db/interfaces';
import { AnalyticsService } from '../../../src/services/analytics.service';
import { ResponseRecorderService } from '../../../src/services/response-recorder.service';
import { StepResolverService } from '../../../src/services/step-resolver.service';
import { InMemoryUnitOfWork } from '../../support/in-memory-unit-of-work';
import { createStubLogger, seedTemplate } from '../../support/fixtures';

describe('AnalyticsService', () => {
    let unitOfWork: InMemoryUnitOfWork;
    let recorder: ResponseRecorderService;
    let analytics: AnalyticsService;
    let painting: TemplateWithQuestions;

    // One all_or_nothing question worth 4 points: option 0 correct
    const answer = (candidateId: number, templateId: number, question: TemplateWithQuestions['questions'][number], optionIndex: number) =>
        recorder.submit(candidateId, templateId, [
            { questionId: question.id, selectedOptionIds: [question.options[optionIndex].id] }
        ]);

    beforeEach(async () => {
        unitOfWork = new InMemoryUnitOfWork();
        const logger = createStubLogger();
        recorder = new ResponseRecorderService(unitOfWork, new StepResolverService(unitOfWork, logger), logger);
        analytics = new AnalyticsService(unitOfWork);

        painting = await seedTemplate(unitOfWork, {
            questions: [{ points: 4, type: 'single_select', options: [{ correct: true }, {}, {}] }]
        });
    });

    describe('templateStats', () => {
        it('averages scores across responses', async () => {
            await answer(1, painting.id, painting.questions[0], 0);
            await answer(2, painting.id, painting.questions[0], 1);
            await answer(3, painting.id, painting.questions[0], 0);

            expect(await analytics.templateStats(painting.id)).toEqual({
                template_id: painting.id,
                total_responses: 3,
                average_score: 2.67,
                average_max_score: 4,
                average_percentage: 66.67
            });
        });

        it('reports zeros for a template without responses', async () => {
            expect(await analytics.templateStats(painting.id)).toEqual({
                template_id: painting.id,
                total_responses: 0,
                average_score: 0,
                average_max_score: 0,
                average_percentage: 0
            });
        });

        it('throws for an unknown template', async () => {
            await expect(analytics.templateStats(404)).rejects.toThrow('Template 404 not found');
        });
    });

    describe('statsByPosition', () => {
        it('groups by position and template in step order', async () => {
            const finishing = await seedTemplate(unitOfWork, {
                title: 'Finishing',
                step: 2,
                questions: [{ points: 2, options: [{ correct: true }] }]
            });
            const wiring = await seedTemplate(unitOfWork, {
                position: 'Electricista',
                title: 'Wiring',
                questions: [{ points: 1, options: [{ correct: true }] }]
            });
            await answer(1, finishing.id, finishing.questions[0], 0);
            await answer(1, painting.id, painting.questions[0], 0);
            await answer(2, wiring.id, wiring.questions[0], 0);

            const rows = await analytics.statsByPosition();

            expect(rows.map((row) => [row.position_key, row.template_title, row.total_responses, row.average_percentage])).toEqual([
                ['Electricista', 'Wiring', 1, 100],
                ['Pintor', 'Painting basics', 1, 100],
                ['Pintor', 'Finishing', 1, 100]
            ]);
        });

        it('filters by position and skips templates without responses', async () => {
            await seedTemplate(unitOfWork, { title: 'Unused', step: 2 });
            await answer(1, painting.id, painting.questions[0], 2);

            const rows = await analytics.statsByPosition('Pintor');

            expect(rows).toEqual([{
                position_key: 'Pintor',
                template_title: 'Painting basics',
                step_number: 1,
                template_id: painting.id,
                total_responses: 1,
                average_score: 0,
                average_max_score: 4,
                average_percentage: 0
            }]);
        });
    });

    describe('optionDistribution', () => {
        it('counts selections per option, most chosen first, unchosen at 0', async () => {
            const question = painting.questions[0];
            await answer(1, painting.id, question, 1);
            await answer(2, painting.id, question, 1);
            await answer(3, painting.id, question, 0);

            const distribution = await analytics.optionDistribution(question.id);

            expect(distribution.map((row) => [row.option_id, row.selection_count, row.is_correct])).toEqual([
                [question.options[1].id, 2, false],
                [question.options[0].id, 1, true],
                [question.options[2].id, 0, false]
            ]);
        });

        it('throws for an unknown question', async () => {
            await expect(analytics.optionDistribution(404)).rejects.toThrow('Question 404 not found');
        });
    });
});
