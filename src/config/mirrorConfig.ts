import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../utils/logger.js';
import { ValidationError, errorCode, errorMessage } from '../errors/mirrorErrors.js';

/**
 * One configured branch: its snapshot is published to publishDir, and the
 * previous publishDir content is copied to backupDir first
 */
export interface MirrorTarget {
  enabled: boolean;
  branch: string;
  backupDir?: string;
  publishDir?: string;
  /** Only this directory of the branch is published */
  subPath?: string;
}

export interface MirrorConfig {
  /** GitHub token; empty means anonymous access */
  token: string;
  /** owner/name */
  repository: string;
  backupEnabled: boolean;
  publishEnabled: boolean;
  targets: MirrorTarget[];
}

const DEFAULT_CONFIG: MirrorConfig = {
  token: '',
  repository: '',
  backupEnabled: true,
  publishEnabled: true,
  targets: []
};

export const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

/**
 * Configuration manager for mirror-config.json
 *
 * The file holds what the user saved; GITHUB_TOKEN and
 * BRANCH_MIRROR_REPOSITORY override it for the running process only and
 * are never written back.
 */
export class MirrorConfigManager {
  static readonly CONFIG_FILE = 'mirror-config.json';
  private static configCache: MirrorConfig | null = null;
  private static configPath: string | null = null;

  /**
   * Point the manager at a config file (default: ./mirror-config.json).
   * A missing file is created with defaults.
   */
  static async initialize(configFilePath?: string): Promise<void> {
    MirrorConfigManager.configPath = path.resolve(configFilePath || MirrorConfigManager.CONFIG_FILE);
    MirrorConfigManager.configCache = null;
    log.info(`[CONFIG] Config path set to: ${MirrorConfigManager.configPath}`);

    try {
      await fs.access(MirrorConfigManager.configPath);
      const config = await MirrorConfigManager.loadFileConfig();
      log.info(`[CONFIG] Loaded config with ${config.targets.length} targets`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
      log.info(`[CONFIG] Creating new config: ${MirrorConfigManager.configPath}`);
      await MirrorConfigManager.saveConfig({ ...DEFAULT_CONFIG, targets: [] });
    }
  }

  static getConfigPath(): string {
    if (!MirrorConfigManager.configPath) {
      MirrorConfigManager.configPath = path.resolve(MirrorConfigManager.CONFIG_FILE);
    }
    return MirrorConfigManager.configPath;
  }

  /**
   * Effective configuration: file content merged with defaults, then
   * environment overrides
   *
   * @throws ValidationError when the file holds invalid JSON or fields
   */
  static async getConfig(): Promise<MirrorConfig> {
    const config = await MirrorConfigManager.loadFileConfig();
    return applyEnvironment(config, process.env);
  }

  /**
   * Persist configuration, pretty-printed
   */
  static async saveConfig(config: MirrorConfig): Promise<void> {
    const validated = validateConfig(config);
    const configPath = MirrorConfigManager.getConfigPath();

    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, JSON.stringify(validated, null, 2) + '\n', 'utf-8');

    MirrorConfigManager.configCache = validated;
    log.info(`[CONFIG] Saved configuration to ${configPath}`);
  }

  /**
   * Update top-level fields of the stored configuration
   */
  static async updateConfig(updates: Partial<MirrorConfig>): Promise<MirrorConfig> {
    const config = await MirrorConfigManager.loadFileConfig();
    const updated: MirrorConfig = { ...config, ...updates };
    await MirrorConfigManager.saveConfig(updated);
    return applyEnvironment(updated, process.env);
  }

  static clearCache(): void {
    MirrorConfigManager.configCache = null;
  }

  /**
   * Forget path and cache (tests)
   */
  static reset(): void {
    MirrorConfigManager.configCache = null;
    MirrorConfigManager.configPath = null;
  }

  private static async loadFileConfig(): Promise<MirrorConfig> {
    if (MirrorConfigManager.configCache) {
      return MirrorConfigManager.configCache;
    }

    const configPath = MirrorConfigManager.getConfigPath();
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        log.warn(`[CONFIG] ${configPath} not found, using defaults`);
        return { ...DEFAULT_CONFIG, targets: [] };
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ValidationError('config file', configPath, `valid JSON (${errorMessage(error)})`);
    }

    MirrorConfigManager.configCache = validateConfig(raw);
    return MirrorConfigManager.configCache;
  }
}

/**
 * Check a parsed config object and fill in defaults for absent fields
 */
export function validateConfig(raw: unknown): MirrorConfig {
  if (!isRecord(raw)) {
    throw new ValidationError('config', raw, 'a JSON object');
  }

  const repository = optionalString(raw, 'repository') ?? DEFAULT_CONFIG.repository;
  if (repository && !REPOSITORY_PATTERN.test(repository)) {
    throw new ValidationError('repository', repository, 'owner/name');
  }

  const rawTargets = raw.targets ?? [];
  if (!Array.isArray(rawTargets)) {
    throw new ValidationError('targets', rawTargets, 'an array');
  }

  return {
    token: optionalString(raw, 'token') ?? DEFAULT_CONFIG.token,
    repository,
    backupEnabled: optionalBoolean(raw, 'backupEnabled') ?? DEFAULT_CONFIG.backupEnabled,
    publishEnabled: optionalBoolean(raw, 'publishEnabled') ?? DEFAULT_CONFIG.publishEnabled,
    targets: rawTargets.map((target, index) => validateTarget(target, index))
  };
}

function validateTarget(raw: unknown, index: number): MirrorTarget {
  if (!isRecord(raw)) {
    throw new ValidationError(`targets[${index}]`, raw, 'an object');
  }

  const branch = optionalString(raw, 'branch', `targets[${index}].`);
  if (!branch) {
    throw new ValidationError(`targets[${index}].branch`, raw.branch, 'a non-empty branch name');
  }

  const target: MirrorTarget = {
    enabled: optionalBoolean(raw, 'enabled', `targets[${index}].`) ?? true,
    branch
  };

  const backupDir = optionalString(raw, 'backupDir', `targets[${index}].`);
  if (backupDir) target.backupDir = backupDir;
  const publishDir = optionalString(raw, 'publishDir', `targets[${index}].`);
  if (publishDir) target.publishDir = publishDir;
  const subPath = optionalString(raw, 'subPath', `targets[${index}].`);
  if (subPath) target.subPath = subPath;

  return target;
}

/**
 * Environment wins over the file for the token and the repository
 */
export function applyEnvironment(config: MirrorConfig, env: NodeJS.ProcessEnv): MirrorConfig {
  const repository = env.BRANCH_MIRROR_REPOSITORY || config.repository;
  if (repository && !REPOSITORY_PATTERN.test(repository)) {
    throw new ValidationError('BRANCH_MIRROR_REPOSITORY', repository, 'owner/name');
  }
  return {
    ...config,
    token: env.GITHUB_TOKEN || config.token,
    repository
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string, prefix = ''): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${prefix}${key}`, value, 'a string');
  }
  return value;
}

function optionalBoolean(record: Record<string, unknown>, key: string, prefix = ''): boolean | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${prefix}${key}`, value, 'a boolean');
  }
  return value;
}
