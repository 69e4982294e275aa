/// <reference types="node" />
import { z } from 'zod';
import { MatchingConfig, RegionRule, RegionRuleSchema } from '../models/types';
import regionTable from './regions.json';

// =============================================================================
// REGION TABLE
// =============================================================================

/**
 * Service-area table shipped with the app (Ann Arbor neighbourhoods).
 * Validated on load so a typo in the JSON fails at startup, not mid-match.
 */
export const DEFAULT_REGIONS: RegionRule[] = z.array(RegionRuleSchema).parse(regionTable);

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_CONFIG: MatchingConfig = {
  id: 'default',
  name: 'Default Configuration',

  // Fairness
  basePriorityRange: 1000,          // Base priority in [1, 1000]
  pairingPenalty: 1000,             // Per pairing already made this week

  // Drives
  defaultSeatCapacity: 3,

  regions: DEFAULT_REGIONS,

  isDefault: true,
  createdAt: new Date(),
  updatedAt: new Date()
};

// =============================================================================
// CONFIGURATION MANAGER
// =============================================================================

export class ConfigManager {
  private configs: Map<string, MatchingConfig> = new Map();
  private defaultConfigId: string = 'default';

  constructor() {
    this.configs.set('default', DEFAULT_CONFIG);
  }

  /**
   * Get a configuration by ID, or return default if not found
   */
  getConfig(configId?: string): MatchingConfig {
    if (!configId) {
      return this.getDefaultConfig();
    }
    return this.configs.get(configId) || this.getDefaultConfig();
  }

  getDefaultConfig(): MatchingConfig {
    return this.configs.get(this.defaultConfigId) || DEFAULT_CONFIG;
  }

  hasConfig(configId: string): boolean {
    return this.configs.has(configId);
  }

  /**
   * Create or update a configuration
   */
  saveConfig(config: MatchingConfig): MatchingConfig {
    const now = new Date();
    const existingConfig = this.configs.get(config.id);

    const updatedConfig: MatchingConfig = {
      ...config,
      createdAt: existingConfig?.createdAt || now,
      updatedAt: now
    };

    validateConfig(updatedConfig);

    // If this is being set as default, unset others
    if (updatedConfig.isDefault) {
      this.configs.forEach((c, id) => {
        if (id !== config.id && c.isDefault) {
          this.configs.set(id, { ...c, isDefault: false });
        }
      });
      this.defaultConfigId = config.id;
    }

    this.configs.set(config.id, updatedConfig);
    return updatedConfig;
  }

  /**
   * Merge a partial update into a stored config and save it. An unknown
   * id starts from a copy of the default config.
   */
  updateConfig(configId: string, updates: Partial<MatchingConfig>): MatchingConfig {
    const existingConfig = this.getConfig(configId);
    const merged = this.applyOverrides(existingConfig, updates);

    return this.saveConfig({
      ...merged,
      id: configId,
      isDefault: updates.isDefault ?? (this.hasConfig(configId) && existingConfig.isDefault)
    });
  }

  listConfigs(): MatchingConfig[] {
    return Array.from(this.configs.values());
  }

  /**
   * Apply one-time overrides to a config (doesn't persist)
   */
  applyOverrides(
    baseConfig: MatchingConfig,
    overrides: Partial<MatchingConfig>
  ): MatchingConfig {
    const merged: MatchingConfig = {
      ...baseConfig,
      ...overrides,
      regions: overrides.regions || baseConfig.regions
    };
    validateConfig(merged);
    return merged;
  }
}

/**
 * Reject configs that would break the fairness ordering.
 */
export function validateConfig(config: MatchingConfig): void {
  if (!Number.isInteger(config.basePriorityRange) || config.basePriorityRange < 1) {
    throw new Error(`basePriorityRange must be a positive integer, got ${config.basePriorityRange}`);
  }
  if (config.pairingPenalty < config.basePriorityRange) {
    throw new Error(
      `pairingPenalty (${config.pairingPenalty}) must be at least basePriorityRange (${config.basePriorityRange})`
    );
  }
  if (!Number.isInteger(config.defaultSeatCapacity) || config.defaultSeatCapacity < 1) {
    throw new Error(`defaultSeatCapacity must be a positive integer, got ${config.defaultSeatCapacity}`);
  }
  if (config.regions.length === 0) {
    throw new Error('At least one region is required');
  }
}

// Singleton instance
export const configManager = new ConfigManager();

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

export interface EnvironmentConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  googleMapsApiKey: string;
  firebase: {
    projectId: string;
    privateKey: string;
    clientEmail: string;
  };
  allowedOrigins: string[];
}

const NODE_ENVS: EnvironmentConfig['nodeEnv'][] = ['development', 'production', 'test'];

function readNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  return NODE_ENVS.find(env => env === value) ?? 'development';
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    port: parseInt(process.env.PORT || '3001', 10),
    nodeEnv: readNodeEnv(process.env.NODE_ENV),
    googleMapsApiKey: process.env.GOOGLE_MAPS_API_KEY || '',
    firebase: {
      projectId: process.env.FIREBASE_PROJECT_ID || '',
      privateKey: (process.env.FIREBASE_PRIVATE_KEY || '').replace(/\\n/g, '\n'),
      clientEmail: process.env.FIREBASE_CLIENT_EMAIL || ''
    },
    allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:5173').split(',')
  };
}

/**
 * True when all three Firebase service-account values are present.
 */
export function hasFirebaseCredentials(env: EnvironmentConfig): boolean {
  const { projectId, privateKey, clientEmail } = env.firebase;
  return Boolean(projectId && privateKey && clientEmail);
}
