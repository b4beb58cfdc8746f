#!/usr/bin/env node
import { program } from 'commander';
import { PACKAGE_INFO } from './config/package-info';
import { registerCompareCommand } from './cli/compare-command';
import { registerEvaluateCommand } from './cli/evaluate-command';
import { registerInitCommand } from './cli/init-command';
import { registerStatsCommand } from './cli/stats-command';
import { registerValidateCommand } from './cli/validate-command';

// Set up Commander program
program
  .name('goldspan')
  .description('Span-level evaluation of named entity predictions against gold annotations')
  .version(PACKAGE_INFO.version);

// Options are defined per command to avoid conflicts
registerEvaluateCommand(program);
registerCompareCommand(program);
registerValidateCommand(program);
registerStatsCommand(program);
registerInitCommand(program);

// Parse command line arguments
program.parseAsync().catch((e: unknown) => {
  const err = e instanceof Error ? e : new Error(String(e));
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
