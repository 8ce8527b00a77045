import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import {
    computeScore,
    groupSelections,
    lintQuestion,
    percentageOf,
    scoreQuestion
} from '../../../src/services/scoring.service';
import { ids, scorable } from '../../support/fixtures';

describe('scoreQuestion', () => {
    describe('all_or_nothing', () => {
        // A and B correct, C incorrect
        const question = scorable('all_or_nothing', 'multi_select', 5, [
            { correct: true },
            { correct: true },
            { correct: false }
        ]);

        it('awards full points only for the exact correct set', () => {
            expect(scoreQuestion(question, ids(1, 2)).toString()).toBe('5');
        });

        it.each([
            ['a subset of the correct options', ids(1)],
            ['a superset including an incorrect option', ids(1, 2, 3)],
            ['only the incorrect option', ids(3)],
            ['no selection', ids()]
        ])('awards 0 for %s', (_label, selected) => {
            expect(scoreQuestion(question, selected).toString()).toBe('0');
        });

        it('awards 0 when no option is marked correct, even for an empty selection', () => {
            const noCorrect = scorable('all_or_nothing', 'multi_select', 2, [{}, {}]);

            expect(scoreQuestion(noCorrect, ids()).toString()).toBe('0');
            expect(scoreQuestion(noCorrect, ids(1)).toString()).toBe('0');
        });

        it('ignores ids that are not options of the question', () => {
            expect(scoreQuestion(question, ids(1, 2, 999)).toString()).toBe('5');
        });
    });

    describe('weighted', () => {
        it('scales a single-select choice against the best option', () => {
            const question = scorable('weighted', 'single_select', 1, [
                { points: 1 },
                { points: 2 },
                { points: 3 }
            ]);

            expect(scoreQuestion(question, ids(1)).toDecimalPlaces(4).toString()).toBe('0.3333');
            expect(scoreQuestion(question, ids(3)).toString()).toBe('1');
        });

        it('normalizes multi-select choices by the total option points', () => {
            const question = scorable('weighted', 'multi_select', 4, [
                { points: 2 },
                { points: 3 },
                { points: 5 }
            ]);

            expect(scoreQuestion(question, ids(1, 3)).toString()).toBe('2.8');
            expect(scoreQuestion(question, ids()).toString()).toBe('0');
            expect(scoreQuestion(question, ids(1, 2, 3)).toString()).toBe('4');
        });

        it('ignores is_correct', () => {
            const question = scorable('weighted', 'multi_select', 1, [
                { correct: true, points: 1 },
                { correct: false, points: 3 }
            ]);

            expect(scoreQuestion(question, ids(2)).toString()).toBe('0.75');
        });

        it('scores 0 when every option is worth 0 points', () => {
            const single = scorable('weighted', 'single_select', 3, [{ points: 0 }, { points: 0 }]);
            const multi = scorable('weighted', 'multi_select', 3, [{ points: 0 }, { points: 0 }]);

            expect(scoreQuestion(single, ids(1)).toString()).toBe('0');
            expect(scoreQuestion(multi, ids(1, 2)).toString()).toBe('0');
        });
    });

    describe('partial', () => {
        it('credits the share of correct options selected when no option carries points', () => {
            const question = scorable('partial', 'multi_select', 6, [
                { correct: true },
                { correct: true },
                { correct: true },
                { correct: false }
            ]);

            expect(scoreQuestion(question, ids(1, 2)).toString()).toBe('4');
            expect(scoreQuestion(question, ids(1, 2, 3)).toString()).toBe('6');
            expect(scoreQuestion(question, ids()).toString()).toBe('0');
        });

        it('does not penalize incorrect selections', () => {
            const question = scorable('partial', 'multi_select', 6, [
                { correct: true },
                { correct: true },
                { correct: true },
                { correct: false }
            ]);

            expect(scoreQuestion(question, ids(1, 2, 4)).toString()).toBe('4');
            expect(scoreQuestion(question, ids(4)).toString()).toBe('0');
        });

        it('weights correct options by option_points when any are set', () => {
            const question = scorable('partial', 'multi_select', 2, [
                { correct: true, points: 1 },
                { correct: true, points: 3 },
                { correct: false, points: 5 }
            ]);

            expect(scoreQuestion(question, ids(2)).toString()).toBe('1.5');
            expect(scoreQuestion(question, ids(1, 2)).toString()).toBe('2');
        });

        it('scales a single-select correct choice against the best correct option', () => {
            const question = scorable('partial', 'single_select', 3, [
                { correct: true, points: 2 },
                { correct: true, points: 4 },
                { correct: false }
            ]);

            expect(scoreQuestion(question, ids(1)).toString()).toBe('1.5');
            expect(scoreQuestion(question, ids(2)).toString()).toBe('3');
            expect(scoreQuestion(question, ids(3)).toString()).toBe('0');
        });

        it('never decreases when another correct option is added to the selection', () => {
            const question = scorable('partial', 'multi_select', 10, [
                { correct: true, points: 1 },
                { correct: true, points: 2 },
                { correct: true, points: 4 },
                { correct: false, points: 8 }
            ]);

            const steps = [ids(4), ids(4, 1), ids(4, 1, 2), ids(4, 1, 2, 3)]
                .map((selected) => scoreQuestion(question, selected));

            for (let index = 1; index < steps.length; index++) {
                expect(steps[index].greaterThanOrEqualTo(steps[index - 1])).toBe(true);
            }
            expect(steps[3].toString()).toBe('10');
        });

        it('scores 0 without correct options', () => {
            const question = scorable('partial', 'multi_select', 2, [{ points: 1 }, { points: 2 }]);

            expect(scoreQuestion(question, ids(1, 2)).toString()).toBe('0');
        });
    });

    it('keeps every contribution between 0 and the question points', () => {
        const questions = [
            scorable('all_or_nothing', 'single_select', 2, [{ correct: true }, {}]),
            scorable('partial', 'multi_select', 2, [{ correct: true, points: 5 }, { correct: true, points: 1 }, {}]),
            scorable('weighted', 'multi_select', 2, [{ points: 7 }, { points: 1 }]),
            scorable('weighted', 'single_select', 2, [{ points: 7 }, { points: 1 }])
        ];
        const selections = [ids(), ids(1), ids(2), ids(1, 2), ids(1, 2, 3)];

        for (const question of questions) {
            for (const selected of selections) {
                const earned = scoreQuestion(question, selected);
                expect(earned.greaterThanOrEqualTo(0)).toBe(true);
                expect(earned.lessThanOrEqualTo(question.points)).toBe(true);
            }
        }
    });
});

describe('computeScore', () => {
    const multiAllOrNothing = { ...scorable('all_or_nothing', 'multi_select', 5, [
        { correct: true },
        { correct: true },
        { correct: false }
    ]), id: 1 };

    it('scores the exact correct set at 100 percent', () => {
        const result = computeScore([multiAllOrNothing], new Map([[1, ids(1, 2)]]));

        expect(result.score.toString()).toBe('5');
        expect(result.maxScore.toString()).toBe('5');
        expect(result.percentage.toString()).toBe('100');
    });

    it('scores a partial or over-complete answer at 0', () => {
        expect(computeScore([multiAllOrNothing], new Map([[1, ids(1)]])).score.toString()).toBe('0');
        expect(computeScore([multiAllOrNothing], new Map([[1, ids(1, 2, 3)]])).score.toString()).toBe('0');
    });

    describe('weighted options worth 1, 2 and 3 with question points 1.0', () => {
        const options = [{ points: 1 }, { points: 2 }, { points: 3 }];

        it('gives the top option full credit on a single-select question', () => {
            const question = { ...scorable('weighted', 'single_select', '1.0', options), id: 1 };

            expect(computeScore([question], new Map([[1, ids(3)]])).score.toString()).toBe('1');
        });

        it('gives half credit for options worth 3 of 6 points on a multi-select question', () => {
            const question = { ...scorable('weighted', 'multi_select', '1.0', options), id: 1 };

            expect(computeScore([question], new Map([[1, ids(1, 2)]])).score.toString()).toBe('0.5');
            expect(computeScore([question], new Map([[1, ids(3)]])).score.toString()).toBe('0.5');
        });
    });

    it('sums every question into max_score whatever was selected', () => {
        const questions = [
            { ...scorable('all_or_nothing', 'single_select', 2, [{ correct: true }, {}]), id: 1 },
            { ...scorable('weighted', 'multi_select', '3.5', [{ points: 1 }, { points: 1 }]), id: 2 },
            { ...scorable('partial', 'multi_select', '0.25', [{ correct: true }, { correct: true }]), id: 3 }
        ];
        const submissions = [
            new Map<number, ReadonlySet<number>>(),
            new Map([[1, ids(1)]]),
            new Map([[1, ids(2)], [2, ids(1, 2)], [3, ids(1)]])
        ];

        for (const selections of submissions) {
            expect(computeScore(questions, selections).maxScore.toString()).toBe('5.75');
        }
    });

    it('lists one breakdown entry per question, unanswered ones at 0', () => {
        const questions = [
            { ...scorable('all_or_nothing', 'single_select', 2, [{ correct: true }, {}]), id: 1 },
            { ...scorable('weighted', 'multi_select', 4, [{ points: 1 }, { points: 3 }]), id: 2 }
        ];

        const result = computeScore(questions, new Map([[2, ids(2, 1)]]));

        expect(result.breakdown.map((entry) => ({
            questionId: entry.questionId,
            scoringMode: entry.scoringMode,
            selectedOptionIds: entry.selectedOptionIds,
            earned: entry.earned.toString(),
            possible: entry.possible.toString()
        }))).toEqual([
            { questionId: 1, scoringMode: 'all_or_nothing', selectedOptionIds: [], earned: '0', possible: '2' },
            { questionId: 2, scoringMode: 'weighted', selectedOptionIds: [1, 2], earned: '4', possible: '4' }
        ]);
        expect(result.score.toString()).toBe('4');
        expect(result.percentage.toDecimalPlaces(2).toString()).toBe('66.67');
    });

    it('reports 0 percent for a template without points', () => {
        const result = computeScore([], new Map<number, ReadonlySet<number>>());

        expect(result.maxScore.toString()).toBe('0');
        expect(result.percentage.toString()).toBe('0');
    });
});

describe('percentageOf', () => {
    it('returns 0 when max score is 0', () => {
        expect(percentageOf(new Decimal(3), new Decimal(0)).toString()).toBe('0');
    });

    it('keeps full precision', () => {
        expect(percentageOf(new Decimal(1), new Decimal(8)).toString()).toBe('12.5');
    });
});

describe('groupSelections', () => {
    it('groups selected option ids by question', () => {
        const grouped = groupSelections([
            { questionId: 1, optionId: 10 },
            { questionId: 2, optionId: 20 },
            { questionId: 1, optionId: 11 }
        ]);

        expect([...grouped.keys()]).toEqual([1, 2]);
        expect([...(grouped.get(1) ?? [])]).toEqual([10, 11]);
        expect([...(grouped.get(2) ?? [])]).toEqual([20]);
    });
});

describe('lintQuestion', () => {
    it('flags a question without options', () => {
        expect(lintQuestion(scorable('partial', 'multi_select', 1, [])).map((w) => w.code)).toEqual(['no_options']);
    });

    it('flags a weighted question whose options carry no points', () => {
        const question = scorable('weighted', 'multi_select', 1, [{ correct: true }, {}]);

        expect(lintQuestion(question).map((w) => w.code)).toEqual(['weighted_without_points']);
    });

    it('flags correctness-based questions without a correct option', () => {
        expect(lintQuestion(scorable('all_or_nothing', 'multi_select', 1, [{}, {}])).map((w) => w.code))
            .toEqual(['no_correct_option']);
        expect(lintQuestion(scorable('partial', 'single_select', 1, [{}, {}])).map((w) => w.code))
            .toEqual(['no_correct_option']);
    });

    it('flags an all_or_nothing single-select question with several correct options', () => {
        const question = scorable('all_or_nothing', 'single_select', 1, [{ correct: true }, { correct: true }]);

        expect(lintQuestion(question)).toEqual([{
            questionId: 100,
            code: 'single_select_multiple_correct',
            message: 'Single-select question marks several options correct; an exact match is impossible'
        }]);
    });

    it('accepts a well-formed question', () => {
        expect(lintQuestion(scorable('partial', 'multi_select', 1, [{ correct: true }, {}]))).toEqual([]);
    });
});
