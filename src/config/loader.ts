/**
 * Configuration lookup and scan-root resolution
 *
 * A scan reads its settings from an explicit `--config` file, else from the
 * nearest `metanote.config.json`, `.metanoterc.json`, `.metanoterc` or
 * `package.json` "metanote" key above the scan root, else the defaults.
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'metanote.config.json',
  '.metanoterc.json',
  '.metanoterc',
];

const PACKAGE_KEY = 'metanote';

/** A validated config and the file it came from */
export interface LocatedConfig {
  config: Config;
  source: string;
}

/**
 * Everything a scan needs to know about where it runs: the scan path, the
 * directory that relative output paths hang off, and the settings in force.
 */
export interface ScanSetup {
  rootPath: string;
  isFile: boolean;
  baseDir: string;
  config: Config;
  /** Config file in force, or null when running on defaults */
  configSource: string | null;
  outputs: {
    inventory: string;
    indexes: string;
  };
}

function validate(rawConfig: unknown, source: string): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration in ${source}:\n${errors}`);
  }

  return result.data;
}

/**
 * Read and validate one config file. Throws on a missing file, bad JSON or
 * a schema violation, naming the offending file.
 */
export async function loadConfig(configPath: string): Promise<Config> {
  const source = path.resolve(configPath);

  if (!fs.existsSync(source)) {
    throw new Error(`Config file not found: ${source}`);
  }

  const content = await fs.promises.readFile(source, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${source}`);
  }

  return validate(rawConfig, source);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * The "metanote" section of a package.json. A package.json that cannot be
 * read or has no such key is not a config; a present but invalid section is
 * an error like any other config file.
 */
function readPackageSection(packagePath: string): Config | null {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  } catch {
    return null;
  }

  if (typeof packageContent !== 'object' || packageContent === null || !(PACKAGE_KEY in packageContent)) {
    return null;
  }

  return validate(packageContent[PACKAGE_KEY], `${packagePath} ("${PACKAGE_KEY}" key)`);
}

/**
 * Walk up from `startDir` to the filesystem root and return the first
 * config found, with its location.
 */
export async function findConfig(startDir: string): Promise<LocatedConfig | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return { config: await loadConfig(configPath), source: configPath };
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const fromPackage = readPackageSection(packagePath);
      if (fromPackage) {
        return { config: fromPackage, source: packagePath };
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Resolve the scan path and the settings for scanning it.
 *
 * A single file scans relative to its own directory. Config lookup starts
 * at that directory (the working directory when the scan path is missing,
 * so the scanner can report it), and default output paths resolve against
 * it rather than against the config file's location.
 */
export async function resolveScanSetup(target: string, configPath?: string): Promise<ScanSetup> {
  const rootPath = path.resolve(target);
  const exists = fs.existsSync(rootPath);
  const isFile = exists && fs.statSync(rootPath).isFile();
  const baseDir = isFile ? path.dirname(rootPath) : rootPath;

  let located: LocatedConfig | null;
  if (configPath) {
    located = { config: await loadConfig(configPath), source: path.resolve(configPath) };
  } else {
    located = await findConfig(exists ? baseDir : process.cwd());
  }

  const config = located?.config ?? getDefaultConfig();

  return {
    rootPath,
    isFile,
    baseDir,
    config,
    configSource: located?.source ?? null,
    outputs: {
      inventory: path.resolve(baseDir, config.output.inventory),
      indexes: path.resolve(baseDir, config.output.indexes),
    },
  };
}
