import type { Command } from 'commander';
import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import { loadConfig, resolveModelSettings, type ModelSettings } from '../boundaries/config-loader';
import { parseEvaluateOptions } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import { JsonReportFormatter } from '../output/json-formatter';
import { log, setSilentMode } from '../output/logger';
import {
  printDocumentTable,
  printErrors,
  printGlobalSummary,
  printOverall,
  printReportHeader,
  printTypeTable,
  printWarnings,
} from '../output/reporter';
import type { EvaluateOptions } from '../schemas/cli-schemas';
import { loadGoldSet, runModelEvaluation } from './orchestrator';
import { OutputFormat, type ModelRunResult } from './types';

export interface EvaluateRun extends ModelRunResult {
  settings: ModelSettings;
  reportPath: string | null;
}

export function defaultReportPath(outputDir: string, model: string): string {
  return path.join(outputDir, `${model}_evaluation.json`);
}

/**
 * Loads configuration and data, scores the model and writes the JSON report
 * file unless `report` is false.
 */
export async function runEvaluate(
  model: string,
  options: EvaluateOptions,
  cwd: string = process.cwd(),
  formatter: JsonReportFormatter = new JsonReportFormatter()
): Promise<EvaluateRun> {
  const config = loadConfig(cwd, options.config);
  const settings = resolveModelSettings(
    config,
    model,
    { goldDir: options.goldDir, predictionsDir: options.predDir, minConfidence: options.minConfidence },
    cwd
  );

  const goldSet = await loadGoldSet(settings.goldDir, settings.concurrency, options.only);
  const result = await runModelEvaluation(goldSet, {
    model,
    predictionsDir: settings.predictionsDir,
    minConfidence: settings.minConfidence,
    concurrency: settings.concurrency,
    verbose: options.verbose,
  });

  let reportPath: string | null = null;
  if (options.report !== false) {
    reportPath = typeof options.report === 'string'
      ? path.resolve(cwd, options.report)
      : defaultReportPath(settings.outputDir, model);
    mkdirSync(path.dirname(reportPath), { recursive: true });
    writeFileSync(reportPath, formatter.toJson(result.report) + '\n', 'utf-8');
  }

  return { ...result, settings, reportPath };
}

/*
 * Registers the 'evaluate' command with Commander.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Score one model\'s predictions against the gold standard')
    .argument('<model>', 'model name, e.g. spacy or gliner')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to custom .goldspan.ini config file')
    .option('--gold-dir <dir>', 'Directory with *_gold.json files')
    .option('--pred-dir <dir>', 'Directory with *_pred.json files for this model')
    .option('--min-confidence <value>', 'Drop predicted entities below this confidence')
    .option('--only <glob>', 'Only evaluate documents whose id matches the glob')
    .option('--report <file>', 'Where to write the JSON report')
    .option('--no-report', 'Do not write a JSON report file')
    .option('--show-errors', 'List every classified error')
    .action(async (model: string, rawOpts: unknown) => {
      let options;
      try {
        options = parseEvaluateOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing evaluate command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const outputFormat = options.output === 'json' ? OutputFormat.Json : OutputFormat.Line;
      setSilentMode(outputFormat === OutputFormat.Json);

      log(`Evaluating ${model}...`);

      let run: EvaluateRun;
      const formatter = new JsonReportFormatter();
      try {
        run = await runEvaluate(model, options, process.cwd(), formatter);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Evaluating model');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const { report, warnings, settings } = run;

      if (outputFormat === OutputFormat.Json) {
        process.stdout.write(formatter.toJson(report) + '\n');
      } else {
        printReportHeader(model, settings.goldDir, settings.predictionsDir, report.perDocument.length);
        printOverall(report);
        printTypeTable(report);
        printDocumentTable(report);
        if (options.showErrors) printErrors(report.errors);
        printWarnings(warnings, report);
        printGlobalSummary(report);
      }

      if (run.reportPath) {
        log(`Detailed results saved to: ${run.reportPath}`);
      }

      process.exit(0);
    });
}
