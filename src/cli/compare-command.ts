import type { Command } from 'commander';
import { loadConfig, resolveModelSettings } from '../boundaries/config-loader';
import { parseCompareOptions } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import { summarizeReport, type ModelSummary } from '../evaluation/index';
import { JsonReportFormatter } from '../output/json-formatter';
import { error, log, setSilentMode, warn } from '../output/logger';
import { printComparisonTable } from '../output/reporter';
import type { CompareOptions } from '../schemas/cli-schemas';
import { loadGoldSet, runModelEvaluation } from './orchestrator';

export interface CompareRun {
  summaries: ModelSummary[];
  failures: Array<{ model: string; error: Error }>;
}

/**
 * Scores each model independently against the same gold set. A model that
 * cannot be evaluated is recorded as a failure; the others still run.
 */
export async function runCompare(
  models: string[],
  options: CompareOptions,
  cwd: string = process.cwd()
): Promise<CompareRun> {
  const config = loadConfig(cwd, options.config);
  const goldSettings = resolveModelSettings(config, models[0] ?? '', { goldDir: options.goldDir }, cwd);
  const goldSet = await loadGoldSet(goldSettings.goldDir, config.concurrency, options.only);

  const summaries: ModelSummary[] = [];
  const failures: CompareRun['failures'] = [];

  for (const model of models) {
    const settings = resolveModelSettings(
      config,
      model,
      { goldDir: options.goldDir, minConfidence: options.minConfidence },
      cwd
    );
    try {
      const { report } = await runModelEvaluation(goldSet, {
        model,
        predictionsDir: settings.predictionsDir,
        minConfidence: settings.minConfidence,
        concurrency: settings.concurrency,
        verbose: options.verbose,
      });
      summaries.push(summarizeReport(report));
    } catch (e: unknown) {
      failures.push({ model, error: handleUnknownError(e, `Evaluating ${model}`) });
    }
  }

  return { summaries, failures };
}

/*
 * Registers the 'compare' command with Commander.
 */
export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Compare several models against the same gold standard')
    .argument('<models...>', 'model names')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to custom .goldspan.ini config file')
    .option('--gold-dir <dir>', 'Directory with *_gold.json files')
    .option('--min-confidence <value>', 'Drop predicted entities below this confidence')
    .option('--only <glob>', 'Only evaluate documents whose id matches the glob')
    .action(async (models: string[], rawOpts: unknown) => {
      let options;
      try {
        options = parseCompareOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing compare command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      setSilentMode(options.output === 'json');
      log(`Comparing ${models.join(', ')}...`);

      let run: CompareRun;
      try {
        run = await runCompare(models, options);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Comparing models');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      for (const failure of run.failures) {
        error(`Error: ${failure.model}: ${failure.error.message}`);
      }
      if (run.summaries.length === 0) {
        warn('No model could be evaluated.');
        process.exit(1);
      }

      if (options.output === 'json') {
        process.stdout.write(new JsonReportFormatter().summariesToJson(run.summaries) + '\n');
      } else {
        printComparisonTable(run.summaries);
      }

      process.exit(run.failures.length > 0 ? 1 : 0);
    });
}
