/**
 * Configuration manager for the Huggies widget server
 * Loads an optional config.yaml, then applies environment overrides on top of defaults
 */

import { readFileSync, existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import YAML from "js-yaml";
import { z } from "zod";
import { StartupError } from "./errors.js";
import { VERSION } from "./version.js";
import type { ServerConfig } from "./types.js";

export const PACKAGE_ROOT = fileURLToPath(new URL("..", import.meta.url));
const DEFAULT_CONFIG_FILE = join(PACKAGE_ROOT, "config.yaml");

const DEFAULT_CONFIG: ServerConfig = {
  server: {
    name: "huggies-mcp-server",
    version: VERSION,
  },
  data: {
    knowledgeFile: join(PACKAGE_ROOT, "data", "knowledge.json"),
    assetsDir: join(PACKAGE_ROOT, "assets"),
  },
  transport: {
    mode: "stdio",
    host: "0.0.0.0",
    port: 8000,
    path: "/mcp",
  },
  search: {
    topN: 3,
  },
};

const FileConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
  }).optional(),
  data: z.object({
    knowledgeFile: z.string().min(1).optional(),
    assetsDir: z.string().min(1).optional(),
  }).optional(),
  transport: z.object({
    mode: z.enum(["stdio", "http"]).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    path: z.string().startsWith("/").optional(),
  }).optional(),
  search: z.object({
    topN: z.number().int().positive().optional(),
  }).optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

const EnvSchema = z.object({
  HUGGIES_KNOWLEDGE_FILE: z.string().min(1).optional(),
  HUGGIES_ASSETS_DIR: z.string().min(1).optional(),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).optional(),
  MCP_HTTP_HOST: z.string().min(1).optional(),
  MCP_HTTP_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  MCP_HTTP_PATH: z.string().startsWith("/").optional(),
});

/**
 * Resolve which config file to read: HUGGIES_CONFIG, else config.yaml beside the package
 */
export function resolveConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return env.HUGGIES_CONFIG || DEFAULT_CONFIG_FILE;
}

/**
 * Read and validate the YAML file. Unreadable YAML falls back to defaults;
 * values of the wrong shape are fatal.
 */
function readFileConfig(file: string): FileConfig {
  if (!existsSync(file)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = YAML.load(readFileSync(file, "utf-8"));
  } catch (error) {
    console.warn(
      `[HuggiesServer] Failed to load config from ${file}, using defaults:`,
      error
    );
    return {};
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }

  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new StartupError(`Invalid config in ${file}: ${result.error.message}`, file);
  }

  // Data paths in the file are relative to the file itself
  const data = result.data.data;
  if (!data) {
    return result.data;
  }

  const base = dirname(file);
  const resolved: NonNullable<FileConfig["data"]> = {};
  if (data.knowledgeFile) resolved.knowledgeFile = resolve(base, data.knowledgeFile);
  if (data.assetsDir) resolved.assetsDir = resolve(base, data.assetsDir);
  return { ...result.data, data: resolved };
}

function readEnvConfig(env: NodeJS.ProcessEnv): z.infer<typeof EnvSchema> {
  const result = EnvSchema.safeParse({
    HUGGIES_KNOWLEDGE_FILE: env.HUGGIES_KNOWLEDGE_FILE || undefined,
    HUGGIES_ASSETS_DIR: env.HUGGIES_ASSETS_DIR || undefined,
    MCP_TRANSPORT: env.MCP_TRANSPORT || undefined,
    MCP_HTTP_HOST: env.MCP_HTTP_HOST || undefined,
    MCP_HTTP_PORT: env.MCP_HTTP_PORT || undefined,
    MCP_HTTP_PATH: env.MCP_HTTP_PATH || undefined,
  });
  if (!result.success) {
    throw new StartupError(`Invalid environment configuration: ${result.error.message}`, "env");
  }
  return result.data;
}

/**
 * Merge partial config with defaults
 */
function mergeConfig(defaults: ServerConfig, override: FileConfig): ServerConfig {
  return {
    server: { ...defaults.server, ...override.server },
    data: { ...defaults.data, ...override.data },
    transport: { ...defaults.transport, ...override.transport },
    search: { ...defaults.search, ...override.search },
  };
}

/**
 * Load configuration from file and environment, or return defaults
 */
export function loadConfig(
  file: string = resolveConfigFile(),
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const merged = mergeConfig(DEFAULT_CONFIG, readFileConfig(file));
  const overrides = readEnvConfig(env);

  return {
    server: merged.server,
    data: {
      knowledgeFile: overrides.HUGGIES_KNOWLEDGE_FILE ?? merged.data.knowledgeFile,
      assetsDir: overrides.HUGGIES_ASSETS_DIR ?? merged.data.assetsDir,
    },
    transport: {
      mode: overrides.MCP_TRANSPORT ?? merged.transport.mode,
      host: overrides.MCP_HTTP_HOST ?? merged.transport.host,
      port: overrides.MCP_HTTP_PORT ?? merged.transport.port,
      path: overrides.MCP_HTTP_PATH ?? merged.transport.path,
    },
    search: merged.search,
  };
}

/**
 * Get config singleton
 */
let configInstance: ServerConfig | null = null;

export function getConfig(): ServerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config cache (useful for testing)
 */
export function resetConfigCache(): void {
  configInstance = null;
}

export function getDefaultConfig(): ServerConfig {
  return mergeConfig(DEFAULT_CONFIG, {});
}
