import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, resolveModelSettings } from '../boundaries/config-loader';
import { parseStatsOptions } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import { ENTITY_TYPE_DESCRIPTIONS, ENTITY_TYPES, isEntityType, type EntityTypeName } from '../evaluation/index';
import { formatRow } from '../output/reporter';
import { loadGoldSet } from './orchestrator';
import type { GoldSet } from './types';

export interface DocumentStats {
  documentId: string;
  title: string | null;
  language: string | null;
  snippets: number;
  skippedSnippets: number;
  entities: number;
  byType: Record<string, number>;
}

export interface GoldStats {
  documents: DocumentStats[];
  totalSnippets: number;
  totalEntities: number;
  byType: Record<string, number>;
}

function metadataString(metadata: Record<string, unknown> | undefined, key: string): string | null {
  const value = metadata?.[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Snippet and entity counts per document, with the per-type breakdown.
 * Skipped snippets are counted separately and their entities are left out.
 */
export function collectGoldStats(goldSet: GoldSet): GoldStats {
  const totals: Record<string, number> = {};
  const documents = goldSet.documents.map(({ document }) => {
    const byType: Record<string, number> = {};
    let snippets = 0;
    let skippedSnippets = 0;
    let entities = 0;

    for (const snippet of document.snippets) {
      if (snippet.skipped) {
        skippedSnippets++;
        continue;
      }
      snippets++;
      for (const entity of snippet.entities) {
        entities++;
        byType[entity.type] = (byType[entity.type] ?? 0) + 1;
        totals[entity.type] = (totals[entity.type] ?? 0) + 1;
      }
    }

    return {
      documentId: document.document_id,
      title: metadataString(document.metadata, 'title'),
      language: metadataString(document.metadata, 'language'),
      snippets,
      skippedSnippets,
      entities,
      byType,
    };
  });

  return {
    documents,
    totalSnippets: documents.reduce((n, d) => n + d.snippets, 0),
    totalEntities: documents.reduce((n, d) => n + d.entities, 0),
    byType: totals,
  };
}

// Label-set types first, then anything unexpected in file order
export function breakdownTypes(byType: Record<string, number>): string[] {
  const known: string[] = ENTITY_TYPES.filter((t: EntityTypeName) => (byType[t] ?? 0) > 0);
  const unknown = Object.keys(byType).filter((t) => !isEntityType(t) && (byType[t] ?? 0) > 0);
  return [...known, ...unknown];
}

function printStats(stats: GoldStats) {
  const idWidth = Math.max(12, ...stats.documents.map((d) => d.documentId.length)) + 1;
  const widths = [idWidth, 10, 10, 10];

  console.log('');
  console.log(chalk.bold('Gold standard documents:'));
  console.log(chalk.dim(formatRow(['Document ID', 'Snippets', 'Entities', 'Language'], widths)));
  console.log('-'.repeat(idWidth + 33));
  for (const d of stats.documents) {
    console.log(formatRow([d.documentId, String(d.snippets), String(d.entities), d.language ?? 'unknown'], widths));
  }

  console.log('');
  console.log(`Total: ${stats.documents.length} documents, ${stats.totalSnippets} snippets, ${stats.totalEntities} entities`);

  const types = breakdownTypes(stats.byType);
  if (types.length > 0) {
    console.log('');
    console.log('Entity breakdown:');
    for (const t of types) {
      const description = isEntityType(t) ? chalk.dim(`  ${ENTITY_TYPE_DESCRIPTIONS[t]}`) : '';
      console.log(`  ${t}: ${stats.byType[t] ?? 0}${description}`);
    }
  }
}

/*
 * Registers the 'stats' command with Commander.
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Summarize the gold standard: snippets, entities and type breakdown')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to custom .goldspan.ini config file')
    .option('--gold-dir <dir>', 'Directory with *_gold.json files')
    .option('--only <glob>', 'Only include documents whose id matches the glob')
    .action(async (rawOpts: unknown) => {
      let stats: GoldStats;
      let output: 'line' | 'json';
      try {
        const options = parseStatsOptions(rawOpts);
        output = options.output;
        const config = loadConfig(process.cwd(), options.config);
        const { goldDir } = resolveModelSettings(config, '', { goldDir: options.goldDir });
        stats = collectGoldStats(await loadGoldSet(goldDir, config.concurrency, options.only));
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Collecting gold standard stats');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (output === 'json') {
        process.stdout.write(JSON.stringify(stats, null, 2) + '\n');
      } else {
        printStats(stats);
      }
      process.exit(0);
    });
}
