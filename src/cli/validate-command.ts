import type { Command } from 'commander';
import { existsSync } from 'fs';
import * as path from 'path';
import { loadConfig, resolveModelSettings } from '../boundaries/config-loader';
import { parseValidateOptions } from '../boundaries/cli-parser';
import {
  findGoldFiles,
  loadGoldDocument,
  loadPredictionDocument,
  predictionFileFor,
  toRawSpan,
} from '../boundaries/dataset-loader';
import { handleUnknownError } from '../errors/index';
import { findInvalidSpans } from '../evaluation/span-validator';
import type { GoldDocument } from '../schemas/dataset-schemas';
import type { ValidateOptions } from '../schemas/cli-schemas';
import { printFileHeader, printValidationRow } from '../output/reporter';

export interface FileValidation {
  file: string;
  errors: string[];
  warnings: string[];
}

export interface DatasetValidation {
  files: FileValidation[];
  errorCount: number;
  warningCount: number;
}

function checkGold(document: GoldDocument, result: FileValidation): void {
  const documentId = document.document_id;
  const seen = new Set<string>();
  for (const snippet of document.snippets) {
    if (seen.has(snippet.snippet_id)) {
      result.warnings.push(`Duplicate snippet id ${snippet.snippet_id}`);
    }
    seen.add(snippet.snippet_id);

    const problems = findInvalidSpans(
      snippet.entities.map(toRawSpan),
      { documentId, snippetId: snippet.snippet_id, role: 'gold' },
      snippet.text.length
    );
    result.errors.push(...problems.map((p) => p.message));

    snippet.entities.forEach((entity, index) => {
      const literal = snippet.text.slice(entity.start, entity.end);
      if (entity.text && literal && literal !== entity.text) {
        result.warnings.push(
          `${documentId}/${snippet.snippet_id} span #${index}: text "${entity.text}" does not match snippet text "${literal}"`
        );
      }
    });
  }
}

async function checkPrediction(gold: GoldDocument, predFile: string, result: FileValidation): Promise<void> {
  const prediction = await loadPredictionDocument(predFile);
  const lengths = new Map(gold.snippets.map((s) => [s.snippet_id, s.text.length]));

  for (const snippet of prediction.snippets) {
    const textLength = lengths.get(snippet.snippet_id);
    if (textLength === undefined) {
      result.warnings.push(`Snippet ${snippet.snippet_id} has no gold counterpart`);
    }
    const problems = findInvalidSpans(
      snippet.entities.map(toRawSpan),
      { documentId: gold.document_id, snippetId: snippet.snippet_id, role: 'predicted' },
      textLength
    );
    result.errors.push(...problems.map((p) => p.message));
  }
}

/**
 * Checks every gold file, and each model prediction file when a predictions
 * directory is given, collecting all problems instead of stopping at the first.
 */
export async function validateDataset(goldDir: string, predictionsDir?: string): Promise<DatasetValidation> {
  const files: FileValidation[] = [];

  for (const goldFile of await findGoldFiles(goldDir)) {
    const goldResult: FileValidation = { file: goldFile.path, errors: [], warnings: [] };
    files.push(goldResult);

    let gold: GoldDocument;
    try {
      gold = await loadGoldDocument(goldFile.path);
    } catch (e: unknown) {
      goldResult.errors.push(handleUnknownError(e, 'Loading gold file').message);
      continue;
    }
    checkGold(gold, goldResult);

    if (!predictionsDir) continue;
    const predFile = predictionFileFor(predictionsDir, goldFile.documentId);
    if (!existsSync(predFile)) {
      goldResult.warnings.push(`No prediction file at ${predFile}`);
      continue;
    }

    const predResult: FileValidation = { file: predFile, errors: [], warnings: [] };
    files.push(predResult);
    try {
      await checkPrediction(gold, predFile, predResult);
    } catch (e: unknown) {
      predResult.errors.push(handleUnknownError(e, 'Loading prediction file').message);
    }
  }

  return {
    files,
    errorCount: files.reduce((n, f) => n + f.errors.length, 0),
    warningCount: files.reduce((n, f) => n + f.warnings.length, 0),
  };
}

function resolveDirs(options: ValidateOptions, cwd: string): { goldDir: string; predictionsDir?: string } {
  const config = loadConfig(cwd, options.config);
  const settings = resolveModelSettings(
    config,
    options.model ?? '',
    { goldDir: options.goldDir, predictionsDir: options.predDir },
    cwd
  );
  if (options.model || options.predDir) {
    return { goldDir: settings.goldDir, predictionsDir: settings.predictionsDir };
  }
  return { goldDir: settings.goldDir };
}

/*
 * Registers the 'validate' command with Commander.
 * Checks gold and prediction files without computing any metrics.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check gold standard and prediction files for invalid spans')
    .option('--config <path>', 'Path to custom .goldspan.ini config file')
    .option('--gold-dir <dir>', 'Directory with *_gold.json files')
    .option('--model <name>', 'Also check this model\'s prediction files')
    .option('--pred-dir <dir>', 'Directory with *_pred.json files to check')
    .action(async (rawOpts: unknown) => {
      let result: DatasetValidation;
      try {
        const options = parseValidateOptions(rawOpts);
        const { goldDir, predictionsDir } = resolveDirs(options, process.cwd());
        result = await validateDataset(goldDir, predictionsDir);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Validating dataset');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      for (const file of result.files) {
        if (file.errors.length === 0 && file.warnings.length === 0) continue;
        printFileHeader(path.relative(process.cwd(), file.file));
        for (const m of file.errors) printValidationRow('error', m);
        for (const m of file.warnings) printValidationRow('warning', m);
        console.log('');
      }

      const okMark = result.errorCount === 0 ? '✓' : '✖';
      console.log(
        `${okMark} ${result.errorCount} errors, ${result.warningCount} warnings in ${result.files.length} file(s).`
      );

      process.exit(result.errorCount > 0 ? 1 : 0);
    });
}
