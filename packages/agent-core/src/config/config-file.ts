/**
 * Config file discovery shared by the LLM and engine loaders.
 *
 * File shape:
 * {
 *   "llm": { "heavyModel": "...", "fastModel": "...", ... },
 *   "engine": { "maxSteps": 12, ... }
 * }
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { createAgentLogger } from '../tracing';

const log = createAgentLogger('ConfigFile');

/**
 * Config file search paths (in priority order)
 */
export const CONFIG_PATHS = [
  // Project-level config
  './routegraph.config.json',
  './.routegraph.config.json',
  // User-level config
  path.join(os.homedir(), '.routegraph', 'config.json'),
  path.join(os.homedir(), '.config', 'routegraph', 'config.json'),
];

/**
 * Find the first existing config file
 */
export function findConfigFile(customPath?: string): string | null {
  const paths = customPath ? [customPath, ...CONFIG_PATHS] : CONFIG_PATHS;

  for (const configPath of paths) {
    const absolutePath = path.isAbsolute(configPath)
      ? configPath
      : path.resolve(process.cwd(), configPath);

    if (fs.existsSync(absolutePath)) {
      return absolutePath;
    }
  }

  return null;
}

/**
 * Read one section of a config file. Unreadable files count as empty.
 */
export function readConfigSection(filePath: string, section: 'llm' | 'engine'): unknown {
  try {
    const content: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof content === 'object' && content !== null && section in content) {
      return Object.getOwnPropertyDescriptor(content, section)?.value;
    }
    return {};
  } catch (error) {
    log.warn('Failed to load config file', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

/**
 * Parse a numeric environment variable; unset or malformed values are ignored
 */
export function readNumberEnv(
  name: string,
  parse: (value: string) => number = (value) => parseInt(value, 10)
): number | undefined {
  const raw = process.env[name];
  if (!raw) {
    return undefined;
  }
  const value = parse(raw);
  return isNaN(value) ? undefined : value;
}
