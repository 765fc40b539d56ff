/**
 * Configuration management for the RTF composer MCP server
 * Loads settings from environment variables with sensible defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import { LAYOUT_PRESET_NAMES, isLayoutPresetName, parseLogLevel } from '@rtf-composer/core';

export interface Config {
  workspaceRoot: string;
  outputDir: string;         // Absolute; RTF_OUTPUT_DIR resolved against the workspace root
  defaultAuthor?: string;
  defaultLayout?: string;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

/**
 * Load .env file into env. Variables already set win over the file.
 */
export function loadEnvFile(env: Env = process.env): void {
  const workspaceRoot = env.RTF_WORKSPACE_ROOT || process.cwd();
  const envPath = path.join(workspaceRoot, '.env');

  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, 'utf-8');
    const lines = envContent.split('\n');

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;

      const [key, ...valueParts] = trimmed.split('=');
      const value = valueParts.join('=').trim();

      if (key && !env[key.trim()]) {
        env[key.trim()] = value;
      }
    }
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  // Load .env file first
  loadEnvFile(env);

  const workspaceRoot = env.RTF_WORKSPACE_ROOT || process.cwd();

  return {
    workspaceRoot,
    outputDir: path.resolve(workspaceRoot, env.RTF_OUTPUT_DIR || 'output'),
    defaultAuthor: env.RTF_DEFAULT_AUTHOR || undefined,
    defaultLayout: env.RTF_DEFAULT_LAYOUT || undefined,
    logLevel: env.RTF_LOG_LEVEL || 'warn',
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.workspaceRoot) {
    errors.push('RTF_WORKSPACE_ROOT is required');
  }

  if (config.defaultLayout !== undefined && !isLayoutPresetName(config.defaultLayout)) {
    errors.push(
      `RTF_DEFAULT_LAYOUT must be one of: ${LAYOUT_PRESET_NAMES.join(', ')}`
    );
  }

  if (parseLogLevel(config.logLevel) === undefined) {
    errors.push('RTF_LOG_LEVEL must be one of: debug, info, warn, error, silent');
  }

  return errors;
}
