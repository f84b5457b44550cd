/**
 * Engine Configuration Loader
 * Reads and validates the JSON configuration. Missing or invalid risk
 * thresholds are fatal: the loader throws before any analysis runs.
 */

import { existsSync, readFileSync } from 'fs';
import { ZodError } from 'zod';
import { EngineConfigSchema, type EngineConfig, type AssetClass, type ZoneAcceptance } from '../validation/schemas.js';
import type { TradeSide, ZoneName } from '../modules/smartMoney/types.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Config');

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function parseEngineConfig(input: unknown): EngineConfig {
  try {
    return EngineConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError('Invalid engine configuration', issues);
    }
    throw error;
  }
}

export function loadEngineConfig(path: string): EngineConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Engine config not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(`Engine config is not valid JSON: ${path}`, [detail]);
  }

  const config = parseEngineConfig(raw);
  logger.info(`Loaded engine config from ${path}`, {
    instruments: config.instruments.length,
    exhaustionMultiplier: config.analysis.exhaustionMultiplier,
  });
  return config;
}

/**
 * Zones a branch may trade from. Asset classes without their own entry
 * use the forex set.
 */
export function getAcceptedZones(config: EngineConfig, assetClass: AssetClass, side: TradeSide): readonly ZoneName[] {
  const acceptance: ZoneAcceptance = config.zones[assetClass] ?? config.zones.forex;
  return acceptance[side];
}
