import { describe, it, expect } from 'vitest';
import { MeanRecallAtKEvaluator, recallMetric } from '../../src/evaluation/evaluator.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

setLogLevel('silent');

describe('MeanRecallAtKEvaluator', () => {
  it('defaults to K = 5 and 10', () => {
    expect(new MeanRecallAtKEvaluator().kValues).toEqual([5, 10]);
  });

  it('rejects empty and non-positive K values', () => {
    expect(() => new MeanRecallAtKEvaluator([])).toThrow(ConfigurationError);
    expect(() => new MeanRecallAtKEvaluator([5, 0])).toThrow('K values must be positive integers, got [5, 0]');
    expect(() => new MeanRecallAtKEvaluator([2.5])).toThrow(ConfigurationError);
  });

  it('collapses repeated K values', () => {
    expect(new MeanRecallAtKEvaluator([5, 5, 10]).kValues).toEqual([5, 10]);
  });

  it('names metrics recall@K', () => {
    expect(recallMetric(3)).toBe('recall@3');
  });

  describe('evaluateSystem', () => {
    const evaluator = new MeanRecallAtKEvaluator([1, 3]);
    const groundTruth = new Map([
      ['q1', ['a', 'c']],
      ['q2', ['x']],
      ['q3', ['m']],
    ]);
    const predictions = new Map([
      ['q1', ['a', 'b', 'c']],
      ['q2', ['y', 'x']],
      ['unlabeled', ['a']],
    ]);

    const report = evaluator.evaluateSystem(predictions, groundTruth);

    it('scores each labeled query per K', () => {
      expect(report.perQueryRecall).toEqual({
        q1: { 'recall@1': 0.5, 'recall@3': 1 },
        q2: { 'recall@1': 0, 'recall@3': 1 },
      });
    });

    it('summarizes per metric', () => {
      expect(report.summary).toEqual({
        'recall@1': { mean: 0.25, std: 0.25, min: 0, max: 0.5 },
        'recall@3': { mean: 1, std: 0, min: 1, max: 1 },
      });
    });

    it('lists labeled queries without predictions and ignores unlabeled predictions', () => {
      expect(report.queriesEvaluated).toBe(2);
      expect(report.missingQueries).toEqual(['q3']);
      expect(Object.keys(report.perQueryRecall)).not.toContain('unlabeled');
    });

    it('keeps every recall in [0, 1]', () => {
      for (const recalls of Object.values(report.perQueryRecall)) {
        for (const value of Object.values(recalls)) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(1);
        }
      }
    });

    it('returns a deeply frozen report', () => {
      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.summary['recall@1'])).toBe(true);
      expect(Object.isFrozen(report.perQueryRecall.q1)).toBe(true);
      expect(Object.isFrozen(report.missingQueries)).toBe(true);
    });
  });

  it('has zero std when every query scores the same', () => {
    const report = new MeanRecallAtKEvaluator([2]).evaluateSystem(
      new Map([
        ['q1', ['a', 'b']],
        ['q2', ['c', 'd']],
      ]),
      new Map([
        ['q1', ['a']],
        ['q2', ['d']],
      ]),
    );

    expect(report.summary['recall@2']).toEqual({ mean: 1, std: 0, min: 1, max: 1 });
  });

  it('produces an empty summary when nothing is evaluated', () => {
    const report = new MeanRecallAtKEvaluator([5]).evaluateSystem(new Map(), new Map([['q1', ['a']]]));

    expect(report.queriesEvaluated).toBe(0);
    expect(report.summary).toEqual({});
    expect(report.missingQueries).toEqual(['q1']);
  });
});
