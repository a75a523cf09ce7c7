/**
 * Configuration module.
 *
 * Loads defaults from tocgen.config.json in the working directory, or from
 * the file named by TOCGEN_CONFIG. Every field is optional.
 */

import fs from 'fs-extra';
import path from 'node:path';

export interface TocgenConfig {
  indent?: number;
  outputFormat?: string;
  title?: string | null;
  customAnchors?: boolean;
  port?: number;
}

export const CONFIG_FILE_NAME = 'tocgen.config.json';

const DEFAULT_TITLE = 'Table of Contents';
const DEFAULT_PORT = 3000;

let cachedConfig: TocgenConfig | null = null;

/**
 * Resolve which config file to read
 */
export function configPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, process.env.TOCGEN_CONFIG ?? CONFIG_FILE_NAME);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the fields with the expected types; anything else is reported
 * and ignored.
 */
export function sanitizeConfig(raw: unknown, source: string): TocgenConfig {
  if (!isRecord(raw)) {
    console.warn(`Config ${source} is not a JSON object, using defaults`);
    return {};
  }

  const config: TocgenConfig = {};
  const { indent, outputFormat, title, customAnchors, port } = raw;

  if (typeof indent === 'number' && Number.isInteger(indent) && indent >= 0) {
    config.indent = indent;
  } else if (indent !== undefined) {
    console.warn(`Config ${source}: ignoring invalid indent ${JSON.stringify(indent)}`);
  }

  if (typeof outputFormat === 'string') {
    config.outputFormat = outputFormat;
  } else if (outputFormat !== undefined) {
    console.warn(`Config ${source}: ignoring invalid outputFormat`);
  }

  if (typeof title === 'string' || title === null) {
    config.title = title;
  } else if (title !== undefined) {
    console.warn(`Config ${source}: ignoring invalid title`);
  }

  if (typeof customAnchors === 'boolean') {
    config.customAnchors = customAnchors;
  } else if (customAnchors !== undefined) {
    console.warn(`Config ${source}: ignoring invalid customAnchors`);
  }

  if (typeof port === 'number' && Number.isInteger(port) && port > 0) {
    config.port = port;
  } else if (port !== undefined) {
    console.warn(`Config ${source}: ignoring invalid port`);
  }

  return config;
}

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(cwd?: string): Promise<TocgenConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const file = configPath(cwd);
  if (await fs.pathExists(file)) {
    const raw: unknown = await fs.readJson(file);
    cachedConfig = sanitizeConfig(raw, path.basename(file));
  } else {
    if (process.env.TOCGEN_CONFIG) {
      console.warn(`Config file ${file} not found, using defaults`);
    }
    cachedConfig = {};
  }

  return cachedConfig;
}

/**
 * Forget the cached configuration (used by tests)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Title to print above the list; null in config disables it
 */
export function resolveTitle(config: TocgenConfig): string | undefined {
  if (config.title === null) return undefined;
  return config.title ?? DEFAULT_TITLE;
}

/**
 * Get server port: PORT env first, then config, then the default.
 * A PORT that is not a positive integer is reported and skipped.
 */
export function resolvePort(config: TocgenConfig): number {
  const fallback = config.port ?? DEFAULT_PORT;
  const envPort = process.env.PORT;
  if (envPort === undefined || envPort === '') {
    return fallback;
  }

  const port = Number(envPort);
  if (!Number.isInteger(port) || port <= 0) {
    console.warn(`Ignoring invalid PORT ${JSON.stringify(envPort)}, using ${fallback}`);
    return fallback;
  }
  return port;
}
