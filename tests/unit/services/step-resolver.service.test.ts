import { describe, it, expect, beforeEach } from 'vitest';
import { Decimal } from 'decimal.js';
import { StepResolverService } from '../../../src/services/step-resolver.service';
import { InMemoryUnitOfWork } from '../../support/in-memory-unit-of-work';
import { createStubLogger, seedTemplate } from '../../support/fixtures';

describe('StepResolverService', () => {
    let unitOfWork: InMemoryUnitOfWork;
    let resolver: StepResolverService;

    beforeEach(() => {
        unitOfWork = new InMemoryUnitOfWork();
        resolver = new StepResolverService(unitOfWork, createStubLogger());
    });

    describe('resolveSteps', () => {
        it('orders active templates by step number', async () => {
            const second = await seedTemplate(unitOfWork, { title: 'Tools', step: 2 });
            const first = await seedTemplate(unitOfWork, { title: 'Safety', step: 1 });
            const third = await seedTemplate(unitOfWork, { title: 'Finishes', step: 3 });

            const result = await resolver.resolveSteps('Pintor');

            expect(result.position_key).toBe('Pintor');
            expect(result.total_steps).toBe(3);
            expect(result.steps.map((step) => step.id)).toEqual([first.id, second.id, third.id]);
        });

        it('drops a template once it is deactivated', async () => {
            const second = await seedTemplate(unitOfWork, { title: 'Tools', step: 2 });
            const first = await seedTemplate(unitOfWork, { title: 'Safety', step: 1 });
            const third = await seedTemplate(unitOfWork, { title: 'Finishes', step: 3 });

            await unitOfWork.repository.updateTemplate(second.id, { is_active: false });
            const result = await resolver.resolveSteps('Pintor');

            expect(result.total_steps).toBe(2);
            expect(result.steps.map((step) => step.step_number)).toEqual([1, 3]);
            expect(result.steps.map((step) => step.id)).toEqual([first.id, third.id]);
        });

        it('breaks step ties by title', async () => {
            const walls = await seedTemplate(unitOfWork, { title: 'Walls', step: 1 });
            const ceilings = await seedTemplate(unitOfWork, { title: 'Ceilings', step: 1 });

            const result = await resolver.resolveSteps('Pintor');

            expect(result.steps.map((step) => step.id)).toEqual([ceilings.id, walls.id]);
        });

        it('returns an empty list for an unknown position', async () => {
            await seedTemplate(unitOfWork, { position: 'Pintor' });

            expect(await resolver.resolveSteps('Electricista')).toEqual({
                position_key: 'Electricista',
                total_steps: 0,
                steps: []
            });
        });

        it('orders questions and options and hides scoring configuration', async () => {
            const template = await seedTemplate(unitOfWork, {
                questions: [
                    {
                        text: 'Second',
                        order: 2,
                        type: 'single_select',
                        mode: 'weighted',
                        points: 4,
                        options: [{ text: 'Yes', points: 3, order: 1 }]
                    },
                    {
                        text: 'First',
                        order: 1,
                        points: 2,
                        options: [
                            { text: 'Roller', correct: true, order: 2 },
                            { text: 'Brush', correct: true, order: 1 }
                        ]
                    }
                ]
            });

            const [step] = (await resolver.resolveSteps('Pintor')).steps;
            const [firstQuestion, secondQuestion] = template.questions
                .slice()
                .sort((a, b) => a.order - b.order);

            expect(step.questions).toEqual([
                {
                    id: firstQuestion.id,
                    question_text: 'First',
                    question_type: 'multi_select',
                    order: 1,
                    options: [
                        { id: firstQuestion.options[0].id, option_text: 'Brush', order: 1 },
                        { id: firstQuestion.options[1].id, option_text: 'Roller', order: 2 }
                    ]
                },
                {
                    id: secondQuestion.id,
                    question_text: 'Second',
                    question_type: 'single_select',
                    order: 2,
                    options: [{ id: secondQuestion.options[0].id, option_text: 'Yes', order: 1 }]
                }
            ]);
        });
    });

    describe('resolveStepsForAdmin', () => {
        it('exposes scoring configuration, total points and lint warnings', async () => {
            const template = await seedTemplate(unitOfWork, {
                questions: [
                    { points: '2.5', mode: 'partial', options: [{ correct: true, points: 1 }, { points: 0 }] },
                    { points: 1, mode: 'all_or_nothing', options: [{}, {}] }
                ]
            });

            const result = await resolver.resolveStepsForAdmin('Pintor');
            const [step] = result.steps;

            expect(step.total_points).toBe(3.5);
            expect(step.questions[0]).toMatchObject({ points: 2.5, scoring_mode: 'partial' });
            expect(step.questions[0].options[0]).toMatchObject({ is_correct: true, option_points: 1 });
            expect(step.warnings).toEqual([{
                questionId: template.questions[1].id,
                code: 'no_correct_option',
                message: 'Question has no correct option and always scores 0'
            }]);
        });
    });

    describe('getProgress', () => {
        it('counts the active steps a candidate has answered', async () => {
            const first = await seedTemplate(unitOfWork, { step: 1 });
            const second = await seedTemplate(unitOfWork, { step: 2 });
            await unitOfWork.repository.createResponse({
                candidateId: 7,
                templateId: first.id,
                position_key: 'Pintor',
                score: new Decimal(0),
                max_score: new Decimal(0)
            });

            expect(await resolver.getProgress(7, 'Pintor')).toEqual({
                total_steps: 2,
                completed_steps: 1,
                is_complete: false,
                pending_template_ids: [second.id]
            });
        });

        it('ignores responses to templates that are no longer active', async () => {
            const retired = await seedTemplate(unitOfWork, { step: 1, active: false });
            const current = await seedTemplate(unitOfWork, { step: 2 });
            await unitOfWork.repository.createResponse({
                candidateId: 7,
                templateId: retired.id,
                position_key: 'Pintor',
                score: new Decimal(0),
                max_score: new Decimal(0)
            });

            expect(await resolver.getProgress(7, 'Pintor')).toEqual({
                total_steps: 1,
                completed_steps: 0,
                is_complete: false,
                pending_template_ids: [current.id]
            });
        });

        it('is complete once every active step is answered', async () => {
            const only = await seedTemplate(unitOfWork);
            await unitOfWork.repository.createResponse({
                candidateId: 3,
                templateId: only.id,
                position_key: 'Pintor',
                score: new Decimal(1),
                max_score: new Decimal(1)
            });

            const progress = await resolver.getProgress(3, 'Pintor');

            expect(progress.is_complete).toBe(true);
            expect(progress.pending_template_ids).toEqual([]);
        });
    });
});
