import type { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';

// Template for .goldspan.ini configuration file
const CONFIG_TEMPLATE = `# goldspan configuration
# Paths are relative to this file.
GoldDir=test_dataset/gold_standard
PredictionsDir=test_dataset/predictions/{model}
OutputDir=test_dataset/evaluation
MinConfidence=0
Concurrency=4

# Per-model overrides
# [spacy]
# PredictionsDir=test_dataset/predictions/spacy_sm
# MinConfidence=0.5
`;

interface InitOptions {
    force?: boolean;
}

/**
 * Registers the 'init' command with Commander.
 * This command writes a starter .goldspan.ini in the current directory.
 */
export function registerInitCommand(program: Command): void {
    program
        .command('init')
        .description('Create a .goldspan.ini configuration file')
        .option('--force', 'Overwrite an existing configuration file')
        .action((opts: InitOptions) => {
            const configPath = path.join(process.cwd(), DEFAULT_CONFIG_FILENAME);

            if (!opts.force && existsSync(configPath)) {
                console.error(`Error: ${DEFAULT_CONFIG_FILENAME} already exists.`);
                console.error(`\nUse --force to overwrite it.`);
                process.exit(1);
            }

            try {
                writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
            } catch (e: unknown) {
                const err = e instanceof Error ? e : new Error(String(e));
                console.error(`Error: Failed to write configuration file: ${err.message}`);
                process.exit(1);
            }

            console.log(`✓ ${DEFAULT_CONFIG_FILENAME} created.\n`);
            console.log(`Next steps:`);
            console.log(`  1. Point GoldDir at your *_gold.json files`);
            console.log(`  2. Point PredictionsDir at each model's *_pred.json files ({model} is replaced)`);
            console.log(`  3. Run 'goldspan evaluate <model>'`);
        });
}
