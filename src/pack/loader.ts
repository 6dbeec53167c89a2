/**
 * Upgrade pack loading
 *
 * Packs are YAML (`.yaml`/`.yml`) or JSON files. A directory is loaded as a
 * catalog of packs keyed by pack name, for pack selection.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml, type SchemaOptions } from 'yaml';
import { errorMessage } from '../errors.js';
import { PackLoadError, duplicatePackName, validationFailure } from './errors.js';
import type { UpgradePack } from './types.js';
import { validateUpgradePack } from './validator.js';

/** Supported file extensions for pack files */
export const PACK_EXTENSIONS = ['.yaml', '.yml', '.json'];

export interface PackLoadOptions {
  /** Base directory for relative paths (default: cwd) */
  basePath?: string;
}

function absolute(path: string, basePath?: string): string {
  return isAbsolute(path) ? path : resolve(basePath ?? process.cwd(), path);
}

/**
 * Read and parse a YAML or JSON document; `yamlOptions` adjust the YAML schema
 */
export async function readDocument(filePath: string, yamlOptions?: SchemaOptions): Promise<unknown> {
  if (!existsSync(filePath)) {
    throw new PackLoadError(`File not found: ${filePath}`, 'FILE_NOT_FOUND');
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new PackLoadError(`Failed to read ${filePath}: ${errorMessage(err)}`, 'FILE_NOT_FOUND', undefined, {
      cause: err,
    });
  }

  try {
    return extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content, yamlOptions);
  } catch (err) {
    throw new PackLoadError(`Failed to parse ${filePath}: ${errorMessage(err)}`, 'PARSE_ERROR', undefined, {
      cause: err,
    });
  }
}

/**
 * Validate a parsed document as an upgrade pack, throwing on errors
 */
export function parseUpgradePack(data: unknown, source: string): UpgradePack {
  const { result, pack } = validateUpgradePack(data);
  if (!pack) {
    throw new PackLoadError(
      `Invalid upgrade pack ${source}: ${result.errors.length} error(s)`,
      'INVALID_CONTENT',
      result
    );
  }
  return pack;
}

/**
 * Load one upgrade pack file
 */
export async function loadUpgradePack(
  packPath: string,
  options: PackLoadOptions = {}
): Promise<UpgradePack> {
  const filePath = absolute(packPath, options.basePath);
  return parseUpgradePack(await readDocument(filePath), filePath);
}

/**
 * Load every pack file in a directory (not recursive), keyed by pack name
 */
export async function loadUpgradePacks(
  dirPath: string,
  options: PackLoadOptions = {}
): Promise<Record<string, UpgradePack>> {
  const root = absolute(dirPath, options.basePath);
  const entries = await readdir(root, { withFileTypes: true });
  const packs: Record<string, UpgradePack> = {};
  const sources: Record<string, string> = {};

  const files = entries
    .filter((entry) => entry.isFile() && PACK_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();

  for (const name of files) {
    const filePath = resolve(root, name);
    const pack = await loadUpgradePack(filePath);
    const existing = sources[pack.name];
    if (existing !== undefined) {
      throw new PackLoadError(
        `Upgrade pack "${pack.name}" is defined twice`,
        'INVALID_CONTENT',
        validationFailure([duplicatePackName(filePath, pack.name, existing)])
      );
    }
    packs[pack.name] = pack;
    sources[pack.name] = filePath;
  }

  return packs;
}

/**
 * Load a single pack file, or every pack in a directory
 */
export async function loadUpgradePackSource(
  path: string,
  options: PackLoadOptions = {}
): Promise<Record<string, UpgradePack>> {
  const target = absolute(path, options.basePath);
  if (existsSync(target) && (await stat(target)).isDirectory()) {
    return loadUpgradePacks(target);
  }
  const pack = await loadUpgradePack(target);
  return { [pack.name]: pack };
}
