import type { ArchiveProvider } from '../api/archiveProvider.js';
import type { MirrorConfig } from '../config/mirrorConfig.js';
import { REPOSITORY_PATTERN } from '../config/mirrorConfig.js';
import { ValidationError, errorMessage } from '../errors/mirrorErrors.js';
import { MirrorService } from '../core/sync/MirrorService.js';
import type { ProgressCallback } from '../core/sync/types.js';
import { resolveLocalPath } from '../utils/pathExpansion.js';
import { mcpLogger } from '../utils/mcpLogger.js';

/**
 * Per-call context handed in by the server
 */
export interface ToolCallContext {
  /** Present when the client asked for progress notifications */
  sendProgress?: (progress: number, total: number, message: string) => Promise<void>;
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
}

/**
 * What every tool may need from the running server
 */
export interface ToolDependencies {
  loadConfig(): Promise<MirrorConfig>;
  createProvider(token: string): ArchiveProvider;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
  additionalProperties?: boolean;
  [key: string]: unknown;
}

/**
 * Base class for branch-mirror MCP tools
 *
 * Subclasses declare name, description and inputSchema and implement
 * execute(). Arguments arrive as unchecked JSON, so every tool reads them
 * through the validate helpers, which throw ValidationError. Errors are
 * left to propagate; the server turns MirrorError into a structured
 * error payload.
 */
export abstract class BaseTool {
  public abstract name: string;
  public abstract description: string;
  public abstract inputSchema: ToolInputSchema;

  public annotations?: {
    title?: string;
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };

  constructor(protected deps: ToolDependencies) {}

  abstract execute(params: Record<string, unknown>, context?: ToolCallContext): Promise<unknown>;

  /**
   * Service wired to a provider authenticated with the configured token
   */
  protected createService(config: MirrorConfig): MirrorService {
    return new MirrorService({ provider: this.deps.createProvider(config.token) });
  }

  /**
   * Repository argument, falling back to the configured one
   */
  protected resolveRepository(params: Record<string, unknown>, config: MirrorConfig): string {
    const repository = this.validate.optionalString(params.repository, 'repository') || config.repository;
    if (!REPOSITORY_PATTERN.test(repository)) {
      throw new ValidationError('repository', repository, 'owner/name (argument or configured)');
    }
    return repository;
  }

  /**
   * Forward core progress as MCP progress notifications
   */
  protected progressReporter(context?: ToolCallContext): ProgressCallback | undefined {
    const sendProgress = context?.sendProgress;
    if (!sendProgress) {
      return undefined;
    }
    return (phase, current, total, message) => {
      sendProgress(current, total, `[${phase}] ${message}`).catch((error: unknown) => {
        mcpLogger.debug(this.name, { message: 'Progress notification failed', details: errorMessage(error) });
      });
    };
  }

  protected validate = {
    string: requireString,
    optionalString,
    boolean: optionalBoolean,
    enum: requireEnum,

    directory: (value: unknown, field: string): string => resolveLocalPath(requireString(value, field)),

    directories: (value: unknown, field: string): string[] => {
      if (!Array.isArray(value) || value.length === 0) {
        throw new ValidationError(field, value, 'a non-empty array of directory paths');
      }
      return value.map((item, index) => resolveLocalPath(requireString(item, `${field}[${index}]`)));
    }
  };
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(field, value, 'a non-empty string');
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(field, value, 'a string');
  }
  return value;
}

function optionalBoolean(value: unknown, field: string, defaultValue: boolean): boolean {
  if (value === undefined || value === null) {
    return defaultValue;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(field, value, 'a boolean');
  }
  return value;
}

function requireEnum<T extends string>(value: unknown, field: string, allowedValues: readonly T[]): T {
  const match = allowedValues.find(allowed => allowed === value);
  if (match === undefined) {
    throw new ValidationError(field, value, `one of ${allowedValues.join(', ')}`);
  }
  return match;
}
