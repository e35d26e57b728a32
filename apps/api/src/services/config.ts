import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { HtmlTableOptionsSchema } from './table/validator';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config path relative to this file: services/ -> src/ -> api/ -> apps/ -> project root
const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../../../config/default.json');

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ServerConfigSchema = z.object({
  port: z.number().int().positive(),
  allowedOrigins: z.array(z.string()),
});

const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  /** Theme defaults layered under every API render request */
  table: HtmlTableOptionsSchema.omit({ title: true, columns: true, cellFormattingRules: true }),
  logging: LoggingConfigSchema,
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root for workspace cwd drift.
    candidates.push(path.resolve(__dirname, '../../../../', rawPath));
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

/**
 * Load application configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let raw: unknown;

  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    console.error(`[config] Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuration file ${configPath} is invalid: ${issues.join('; ')}`);
  }

  const config = parsed.data;

  // Override with environment variables if present
  if (process.env.PORT) {
    const port = Number(process.env.PORT);
    if (Number.isInteger(port) && port > 0) {
      config.server.port = port;
    }
  }
  if (process.env.ALLOWED_ORIGINS) {
    config.server.allowedOrigins = process.env.ALLOWED_ORIGINS.split(',');
  }
  if (process.env.LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
    if (level.success) {
      config.logging.level = level.data;
    }
  }

  cachedConfig = config;
  return config;
}

/**
 * Get the loaded config (loads it on first use)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Whether messages at `level` pass the configured log level
 */
export function isLogLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[getConfig().logging.level];
}
