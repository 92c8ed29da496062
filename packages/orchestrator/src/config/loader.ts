/**
 * YAML configuration loader for orchestrator settings and intent keywords.
 * Files are optional; present-but-invalid files are a hard failure.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import { createLogger } from '../logger.js';
import { InvalidConfigError } from '../errors.js';
import {
  CrewConfigSchema,
  IntentKeywordsSchema,
  type CrewConfig,
  type IntentKeywords,
} from './schema.js';

const logger = createLogger('config-loader');

export const CONFIG_FILE = 'campaign-crew.yaml';
export const INTENT_KEYWORDS_FILE = 'intent-keywords.yaml';

export class ConfigLoader {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  /**
   * Load orchestrator settings, falling back to defaults when the file is absent.
   */
  loadConfig(filePath?: string): CrewConfig {
    const path = filePath ?? join(this.basePath, CONFIG_FILE);
    return this.loadValidated(path, CrewConfigSchema, 'config');
  }

  /**
   * Load free-text intent markers (no-text phrasing, trend requests, build confirmations).
   */
  loadIntentKeywords(filePath?: string): IntentKeywords {
    const path = filePath ?? join(this.basePath, INTENT_KEYWORDS_FILE);
    return this.loadValidated(path, IntentKeywordsSchema, 'intent-keywords');
  }

  /**
   * Load a single YAML file and parse it. Returns null when the file is missing.
   */
  loadYamlFile(filePath: string, label?: string): unknown {
    if (!existsSync(filePath)) {
      logger.warn({ path: filePath, label }, 'Config file not found');
      return null;
    }
    try {
      const content = readFileSync(filePath, 'utf-8');
      const parsed: unknown = YAML.parse(content);
      logger.debug({ path: filePath, label }, 'Loaded config');
      return parsed;
    } catch (err) {
      logger.error({ err, path: filePath, label }, 'Failed to parse config');
      throw new InvalidConfigError(`Failed to parse ${filePath}`, { cause: err });
    }
  }

  private loadValidated<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, label: string): T {
    const raw = this.loadYamlFile(path, label) ?? {};
    const result = schema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
      logger.error({ path, issues }, 'Invalid config');
      throw new InvalidConfigError(`Invalid ${label} in ${path}: ${issues.join('; ')}`);
    }
    return result.data;
  }
}
