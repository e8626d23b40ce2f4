import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { LevelCatalog, LevelFormatError, type LevelCatalogT, type LevelConfigT } from '@ledge/level-format';

/** Resolves a level `source` reference to the raw project JSON. */
export type LevelSourceReader = (source: string, signal?: AbortSignal) => Promise<unknown>;

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new LevelFormatError('MalformedLevelFile', `Level source "${source}" is not valid JSON`, {
      source,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/** Reads sources from disk, resolving relative paths against `rootDir`. */
export function createFileReader(rootDir = process.cwd()): LevelSourceReader {
  return async (source, signal) => {
    const filePath = path.resolve(rootDir, source);
    const text = await readFile(filePath, { encoding: 'utf8', signal });
    return parseJson(text, source);
  };
}

/** Fetches sources over HTTP relative to `baseUrl`; used where levels are served rather than bundled. */
export function createFetchReader(baseUrl: string): LevelSourceReader {
  return async (source, signal) => {
    const url = new URL(source, baseUrl);
    const response = await fetch(url, { signal });
    if (!response.ok) {
      throw new Error(`Failed with ${response.status} ${response.statusText} for ${url.toString()}`);
    }
    return parseJson(await response.text(), source);
  };
}

export interface LoadedCatalog {
  catalog: LevelCatalogT;
  reader: LevelSourceReader;
}

/** Reads a level catalog; level sources inside it resolve relative to the catalog file. */
export async function loadCatalog(catalogPath: string): Promise<LoadedCatalog> {
  const text = await readFile(catalogPath, 'utf8');
  const catalog = LevelCatalog.parse(JSON.parse(text));
  return { catalog, reader: createFileReader(path.dirname(path.resolve(catalogPath))) };
}

export function findLevelConfig(catalog: LevelCatalogT, id: string): LevelConfigT | null {
  return catalog.levels.find((level) => level.id === id) ?? null;
}
