/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.goldspan.ini';
export const MODEL_PLACEHOLDER = '{model}';

export const DEFAULT_GOLD_DIR = 'gold_standard';
export const DEFAULT_PREDICTIONS_DIR = `predictions/${MODEL_PLACEHOLDER}`;
export const DEFAULT_OUTPUT_DIR = 'evaluation';
export const DEFAULT_CONCURRENCY = 4;

export const GOLD_FILE_SUFFIX = '_gold.json';
export const PREDICTION_FILE_SUFFIX = '_pred.json';
