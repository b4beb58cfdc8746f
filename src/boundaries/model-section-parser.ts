import { ConfigError } from '../errors/index';
import type { ModelSection } from '../schemas/config-schemas';

enum SectionKey {
  PREDICTIONS_DIR = 'PredictionsDir',
  MIN_CONFIDENCE = 'MinConfidence',
}

/*
 * Whole-value numeric parse for INI values: NaN for blank or trailing junk.
 */
export function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

export class ModelSectionParser {
  constructor(private readonly configDir: string, private readonly resolvePath: (dir: string, p: string) => string) {}

  /**
   * Parses the raw configuration object to extract per-model sections.
   * Every `[name]` section is a model; unknown keys inside it are ignored.
   * @param rawConfig The raw configuration object parsed from INI
   * @returns A list of model sections in file order
   */
  parseSections(rawConfig: Record<string, unknown>): ModelSection[] {
    const sections: ModelSection[] = [];

    for (const [model, value] of Object.entries(rawConfig)) {
      if (typeof value !== 'object' || value === null || Array.isArray(value)) continue;

      const section: ModelSection = { model };

      for (const [propKey, propValue] of Object.entries(value)) {
        if (typeof propValue !== 'string') continue;

        switch (propKey) {
          case SectionKey.PREDICTIONS_DIR as string:
            if (propValue.trim()) {
              section.predictionsDir = this.resolvePath(this.configDir, propValue.trim());
            }
            break;
          case SectionKey.MIN_CONFIDENCE as string: {
            const parsed = parseNumber(propValue);
            if (Number.isNaN(parsed)) {
              throw new ConfigError(`Invalid MinConfidence value in [${model}]: ${propValue}`);
            }
            section.minConfidence = parsed;
            break;
          }
        }
      }

      sections.push(section);
    }

    return sections;
  }
}
