import type { Command } from '../types.js';
import { UsageError } from '../types.js';
import { getOption, positionals } from '../args.js';
import { createRetrieval, withContext } from '../context.js';

const USAGE = 'arec evaluate <ground-truth> [--test <queries>] [--out <dir>] [--predictions <csv>]';

export const evaluateCommand: Command = {
  name: 'evaluate',
  description: 'Compute Mean Recall@K against labeled queries',
  usage: USAGE,
  handler: async (args) => {
    const [groundTruthPath] = positionals(args, ['test', 'out', 'predictions']);
    if (!groundTruthPath) {
      throw new UsageError('Ground truth path required', USAGE);
    }

    const { formatEvaluationReport } = await import('../../evaluation/report.js');
    const predictionsPath = getOption(args, 'predictions');

    // Score an existing prediction file without loading the model
    if (predictionsPath) {
      const { loadConfig } = await import('../../config/loader.js');
      const { loadGroundTruth } = await import('../../evaluation/ground-truth.js');
      const { loadPredictions } = await import('../../evaluation/prediction-export.js');
      const { MeanRecallAtKEvaluator } = await import('../../evaluation/evaluator.js');

      const evaluator = new MeanRecallAtKEvaluator(loadConfig().evaluation.kValues);
      const predictions = loadPredictions(predictionsPath);
      const report = evaluator.evaluateSystem(predictions, loadGroundTruth(groundTruthPath));
      console.log(formatEvaluationReport(report));
      return;
    }

    const { EvaluationPipeline } = await import('../../evaluation/pipeline.js');
    await withContext({ existing: true }, async (ctx) => {
      const pipeline = new EvaluationPipeline(createRetrieval(ctx), ctx.config.evaluation);
      const { report, files } = await pipeline.run({
        groundTruthPath,
        testQueriesPath: getOption(args, 'test'),
        outputDir: getOption(args, 'out'),
      });

      console.log(formatEvaluationReport(report));
      console.log('');
      for (const file of files) {
        console.log(`Wrote ${file}`);
      }
    });
  },
};
