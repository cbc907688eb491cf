/**
 * Service configuration module.
 *
 * Loads config from config/config.{EPI_CONFIG}.json (relative to the working
 * directory) and provides typed access to configuration values.
 */

import fs from "fs-extra";
import path from "node:path";

export interface ServiceConfig {
  port: number;
  /** Section levels at or beyond this depth are rejected */
  maxSectionDepth: number;
  /** Title reported for sections that have none */
  untitledSectionTitle: string;
  /** Body size limit handed to express.json() */
  jsonLimit: string;
}

export const DEFAULT_CONFIG: ServiceConfig = {
  port: 4000,
  maxSectionDepth: 64,
  untitledSectionTitle: "Untitled Section",
  jsonLimit: "5mb",
};

let cachedConfig: ServiceConfig | null = null;

function pickOverrides(raw: unknown): Partial<ServiceConfig> {
  if (typeof raw !== "object" || raw === null) {
    return {};
  }
  const overrides: Partial<ServiceConfig> = {};
  const values = new Map<string, unknown>(Object.entries(raw));
  const port = values.get("port");
  const maxSectionDepth = values.get("maxSectionDepth");
  const untitledSectionTitle = values.get("untitledSectionTitle");
  const jsonLimit = values.get("jsonLimit");

  if (typeof port === "number" && Number.isInteger(port) && port > 0) {
    overrides.port = port;
  }
  if (typeof maxSectionDepth === "number" && Number.isInteger(maxSectionDepth) && maxSectionDepth > 0) {
    overrides.maxSectionDepth = maxSectionDepth;
  }
  if (typeof untitledSectionTitle === "string") {
    overrides.untitledSectionTitle = untitledSectionTitle;
  }
  if (typeof jsonLimit === "string" && jsonLimit) {
    overrides.jsonLimit = jsonLimit;
  }
  return overrides;
}

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(configDir = path.join(process.cwd(), "config")): Promise<ServiceConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configEnv = process.env.EPI_CONFIG ?? "default";
  const configFileName = `config.${configEnv}.json`;

  try {
    const raw: unknown = await fs.readJson(path.join(configDir, configFileName));
    cachedConfig = { ...DEFAULT_CONFIG, ...pickOverrides(raw) };
    console.log(`Loaded config from ${configFileName}`);
  } catch {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    cachedConfig = { ...DEFAULT_CONFIG };
  }

  return cachedConfig;
}

/**
 * Get configuration synchronously. Defaults apply until loadConfig has run.
 */
export function getConfig(): ServiceConfig {
  return cachedConfig ?? DEFAULT_CONFIG;
}

/**
 * Get server port, PORT taking precedence over the config file.
 */
export function getServerPort(): number {
  const fromEnv = Number(process.env.PORT);
  return Number.isInteger(fromEnv) && fromEnv > 0 ? fromEnv : getConfig().port;
}

/**
 * Forget the loaded config (tests).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
