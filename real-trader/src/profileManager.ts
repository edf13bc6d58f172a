import { promises as fs } from 'fs';
import path from 'path';
import {
  ConfigurationError,
  DEFAULT_EXECUTION_SETTINGS,
  DEFAULT_STRATEGY_PARAMETERS,
  createLogger,
  type ExecutionSettings,
  type ParameterBundle,
  type ProfileStore,
  type StrategyParameters,
} from '../../shared/src/index.js';

const logger = createLogger('profiles');

export const DEFAULT_SYMBOLS = ['AAPL', 'NVDA', 'TSLA', 'AMZN', 'META'];
const PROFILE_VERSION = '1.0';
const PROFILE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface ProfileEnvelope {
  name: string;
  created: string;
  lastModified: string;
  version: string;
  data: ParameterBundle;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function pickNumbers<T extends object>(defaults: T, raw: unknown): T {
  const result = { ...defaults };
  if (!isRecord(raw)) return result;
  for (const key of Object.keys(defaults)) {
    const value = raw[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

export function getDefaultProfileData(): ParameterBundle {
  return {
    symbols: [...DEFAULT_SYMBOLS],
    strategy: { ...DEFAULT_STRATEGY_PARAMETERS },
    execution: { ...DEFAULT_EXECUTION_SETTINGS },
    refreshIntervalSeconds: 60,
    autoRefresh: false,
  };
}

// Fills anything missing or mistyped from the defaults
export function normalizeBundle(raw: unknown): ParameterBundle {
  const defaults = getDefaultProfileData();
  if (!isRecord(raw)) return defaults;

  const symbols = Array.isArray(raw.symbols)
    ? raw.symbols.filter((s): s is string => typeof s === 'string' && s.trim() !== '').map(s => s.trim().toUpperCase())
    : defaults.symbols;

  return {
    symbols: symbols.length > 0 ? symbols : defaults.symbols,
    strategy: pickNumbers<StrategyParameters>(defaults.strategy, raw.strategy),
    execution: pickNumbers<ExecutionSettings>(defaults.execution, raw.execution),
    refreshIntervalSeconds: typeof raw.refreshIntervalSeconds === 'number' && raw.refreshIntervalSeconds > 0
      ? raw.refreshIntervalSeconds
      : defaults.refreshIntervalSeconds,
    autoRefresh: typeof raw.autoRefresh === 'boolean' ? raw.autoRefresh : defaults.autoRefresh,
  };
}

/**
 * Named parameter bundles stored as `<profilesDir>/<name>.json`, each wrapped
 * in a `{ name, created, lastModified, version, data }` envelope.
 */
export class ProfileManager implements ProfileStore {
  constructor(private readonly profilesDir: string = 'profiles') {}

  getProfilePath(name: string): string {
    if (!PROFILE_NAME_PATTERN.test(name)) {
      throw new ConfigurationError([`Invalid profile name "${name}" (use letters, digits, - and _)`]);
    }
    return path.join(this.profilesDir, `${name}.json`);
  }

  async get(name: string): Promise<ParameterBundle | null> {
    const envelope = await this.readEnvelope(this.getProfilePath(name));
    return envelope ? envelope.data : null;
  }

  async put(name: string, bundle: ParameterBundle): Promise<void> {
    const profilePath = this.getProfilePath(name);
    const existing = await this.readEnvelope(profilePath);
    const now = new Date().toISOString();

    const envelope: ProfileEnvelope = {
      name,
      created: existing?.created ?? now,
      lastModified: now,
      version: PROFILE_VERSION,
      data: normalizeBundle(bundle),
    };

    await fs.mkdir(this.profilesDir, { recursive: true });
    await fs.writeFile(profilePath, JSON.stringify(envelope, null, 2), 'utf-8');
    logger.info(`💾 Profile saved: ${name}`);
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.profilesDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    return files
      .filter(file => file.endsWith('.json'))
      .map(file => file.slice(0, -'.json'.length))
      .sort();
  }

  async delete(name: string): Promise<boolean> {
    try {
      await fs.unlink(this.getProfilePath(name));
      logger.info(`🗑️  Profile deleted: ${name}`);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async exportProfile(name: string, exportPath: string): Promise<boolean> {
    try {
      await fs.copyFile(this.getProfilePath(name), exportPath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  // Returns the stored profile name, or null when the file does not exist
  async importProfile(importPath: string, name?: string): Promise<string | null> {
    const envelope = await this.readEnvelope(importPath);
    if (!envelope) return null;

    const profileName = name ?? path.basename(importPath, path.extname(importPath));
    await this.put(profileName, envelope.data);
    return profileName;
  }

  getDefaultProfileData(): ParameterBundle {
    return getDefaultProfileData();
  }

  private async readEnvelope(filePath: string): Promise<ProfileEnvelope | null> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      logger.error(`Error loading profile ${filePath}`, error);
      return null;
    }

    // Bare bundles (no envelope) are accepted on import
    const raw = isRecord(parsed) && 'data' in parsed ? parsed.data : parsed;
    const now = new Date().toISOString();
    return {
      name: isRecord(parsed) && typeof parsed.name === 'string' ? parsed.name : path.basename(filePath, '.json'),
      created: isRecord(parsed) && typeof parsed.created === 'string' ? parsed.created : now,
      lastModified: isRecord(parsed) && typeof parsed.lastModified === 'string' ? parsed.lastModified : now,
      version: isRecord(parsed) && typeof parsed.version === 'string' ? parsed.version : PROFILE_VERSION,
      data: normalizeBundle(raw),
    };
  }
}
