import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_GOLD_DIR,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PREDICTIONS_DIR,
  MODEL_PLACEHOLDER,
} from '../config/constants';
import { ModelSectionParser, parseNumber } from './model-section-parser';

enum ConfigKey {
  GOLD_DIR = 'GoldDir',
  PREDICTIONS_DIR = 'PredictionsDir',
  OUTPUT_DIR = 'OutputDir',
  MIN_CONFIDENCE = 'MinConfidence',
  CONCURRENCY = 'Concurrency',
}

function resolveFrom(dir: string, p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(dir, p);
}

const stripQuotes = (str: string): string =>
  str.trim().replace(/^"|"$/g, '').replace(/^'|'$/g, '');

/**
 * Load and validate configuration from .goldspan.ini.
 *
 * Without an explicit path a missing file is not an error: defaults rooted at
 * `cwd` are returned. Relative paths resolve against the config file's directory.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(iniPath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${iniPath}`);
    }
    return CONFIG_SCHEMA.parse({
      configDir: cwd,
      goldDir: resolveFrom(cwd, DEFAULT_GOLD_DIR),
      predictionsDir: resolveFrom(cwd, DEFAULT_PREDICTIONS_DIR),
      outputDir: resolveFrom(cwd, DEFAULT_OUTPUT_DIR),
    });
  }

  const configDir = path.dirname(iniPath);

  let goldDirRaw: string | undefined;
  let predictionsDirRaw: string | undefined;
  let outputDirRaw: string | undefined;
  let minConfidenceRaw: number | undefined;
  let concurrencyRaw: number | undefined;
  const rawConfigObj: Record<string, Record<string, string>> = {};

  try {
    const raw = readFileSync(iniPath, 'utf-8');
    let currentSection: string | null = null;

    for (const rawLine of raw.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#') || line.startsWith(';')) continue;

      // Section header
      const sectionMatch = line.match(/^\[(.*)\]$/);
      if (sectionMatch && sectionMatch[1]) {
        currentSection = sectionMatch[1].trim();
        if (!rawConfigObj[currentSection]) {
          rawConfigObj[currentSection] = {};
        }
        continue;
      }

      const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
      if (!m || !m[1]) continue;

      const key = m[1];
      const val = stripQuotes(m[2] || '');

      if (currentSection) {
        const section = rawConfigObj[currentSection];
        if (section) section[key] = val;
        continue;
      }

      switch (key) {
        case ConfigKey.GOLD_DIR as string:
          goldDirRaw = val;
          break;
        case ConfigKey.PREDICTIONS_DIR as string:
          predictionsDirRaw = val;
          break;
        case ConfigKey.OUTPUT_DIR as string:
          outputDirRaw = val;
          break;
        case ConfigKey.MIN_CONFIDENCE as string: {
          const parsed = parseNumber(val);
          if (Number.isNaN(parsed)) {
            throw new ConfigError(`Invalid MinConfidence value: ${val}`);
          }
          minConfidenceRaw = parsed;
          break;
        }
        case ConfigKey.CONCURRENCY as string: {
          // Fractions reach the schema, which rejects them
          const parsed = parseNumber(val);
          if (Number.isNaN(parsed)) {
            throw new ConfigError(`Invalid Concurrency value: ${val}`);
          }
          concurrencyRaw = parsed;
          break;
        }
      }
    }
  } catch (e: unknown) {
    if (e instanceof ConfigError) throw e;
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const models = new ModelSectionParser(configDir, resolveFrom).parseSections(rawConfigObj);

  const configData = {
    configDir,
    goldDir: resolveFrom(configDir, goldDirRaw || DEFAULT_GOLD_DIR),
    predictionsDir: resolveFrom(configDir, predictionsDirRaw || DEFAULT_PREDICTIONS_DIR),
    outputDir: resolveFrom(configDir, outputDirRaw || DEFAULT_OUTPUT_DIR),
    minConfidence: minConfidenceRaw,
    concurrency: concurrencyRaw ?? DEFAULT_CONCURRENCY,
    models,
  };

  try {
    return CONFIG_SCHEMA.parse(configData);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid configuration: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}

export interface ModelSettings {
  model: string;
  goldDir: string;
  predictionsDir: string;
  outputDir: string;
  minConfidence: number;
  concurrency: number;
}

export interface SettingOverrides {
  goldDir?: string | undefined;
  predictionsDir?: string | undefined;
  minConfidence?: number | undefined;
}

/**
 * Settings for one model: CLI overrides, then the model's [section], then
 * the global keys. `{model}` in the predictions directory is replaced.
 */
export function resolveModelSettings(
  config: Config,
  model: string,
  overrides: SettingOverrides = {},
  cwd: string = process.cwd()
): ModelSettings {
  const section = config.models.find((m) => m.model === model);
  const predictionsDir = overrides.predictionsDir
    ? resolveFrom(cwd, overrides.predictionsDir)
    : section?.predictionsDir ?? config.predictionsDir;

  return {
    model,
    goldDir: overrides.goldDir ? resolveFrom(cwd, overrides.goldDir) : config.goldDir,
    predictionsDir: predictionsDir.split(MODEL_PLACEHOLDER).join(model),
    outputDir: config.outputDir,
    minConfidence: overrides.minConfidence ?? section?.minConfidence ?? config.minConfidence,
    concurrency: config.concurrency,
  };
}
