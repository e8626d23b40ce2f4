import {
  LevelFormatError,
  findLayer,
  parseLevelFile,
  type LevelConfigT,
  type ParsedLevel,
} from '@ledge/level-format';
import type { Logger } from '@ledge/logger';

import { CollisionMap } from '../collision/map';
import { logger as rootLogger } from '../logger';
import { recordLevelLoad } from '../metrics';
import type { LevelSourceReader } from './source';

export interface ActiveLevel {
  config: LevelConfigT;
  level: Omit<ParsedLevel, 'layers'>;
  map: CollisionMap;
  /** Map of level-exit trigger cells, when the config names a trigger layer. */
  triggers: CollisionMap | null;
  generation: number;
}

export type LoadOutcome = 'activated' | 'superseded';

export interface LoadOptions {
  signal?: AbortSignal;
}

export interface LevelRegistryOptions {
  reader: LevelSourceReader;
  logger?: Logger;
}

export class NoLevelLoadedError extends Error {
  constructor() {
    super('No level has been loaded');
    this.name = 'NoLevelLoadedError';
  }
}

function buildLayerMap(level: ParsedLevel, config: LevelConfigT, identifier: string): CollisionMap {
  const layer = findLayer(level, identifier);
  if (!layer) {
    throw new LevelFormatError('MissingLayer', `Level "${config.level}" has no IntGrid layer named "${identifier}"`, {
      level: config.level,
      layer: identifier,
    });
  }
  return CollisionMap.build(layer);
}

/**
 * Owns the single active level. Loads build a complete replacement off to the side and swap it
 * in with one assignment, so readers see either the old level or the new one. A failed load
 * leaves the previous level in place; a load overtaken by a newer request is discarded.
 */
export class LevelRegistry {
  private active: ActiveLevel | null = null;
  private latestRequest = 0;
  private generationCounter = 0;
  private readonly reader: LevelSourceReader;
  private readonly logger: Logger;

  constructor(options: LevelRegistryOptions) {
    this.reader = options.reader;
    this.logger = options.logger ?? rootLogger.child({ module: 'level-registry' });
  }

  async loadLevel(config: LevelConfigT, options: LoadOptions = {}): Promise<LoadOutcome> {
    const request = ++this.latestRequest;
    const startedAt = performance.now();
    const log = this.logger.child({ levelId: config.id, request });
    const isStale = () => request !== this.latestRequest || options.signal?.aborted === true;

    log.debug({ source: config.source }, 'Loading level');

    let next: ActiveLevel;
    try {
      const raw = await this.reader(config.source, options.signal);
      if (isStale()) {
        recordLevelLoad('superseded', startedAt);
        log.info('Level load superseded before parsing');
        return 'superseded';
      }
      next = this.build(config, raw);
    } catch (error) {
      if (isStale()) {
        recordLevelLoad('superseded', startedAt);
        log.info({ err: error }, 'Superseded level load failed; ignoring');
        return 'superseded';
      }
      recordLevelLoad('failed', startedAt);
      log.warn({ err: error }, 'Level load failed; keeping the previous level');
      throw error;
    }

    this.active = next;
    recordLevelLoad('activated', startedAt);
    log.info(
      {
        level: next.level.identifier,
        width: next.map.width,
        height: next.map.height,
        cellSize: next.map.cellSize,
        solids: next.map.solidCount,
        triggers: next.triggers?.solidCount ?? 0,
        generation: next.generation,
      },
      'Level activated',
    );
    if (next.map.solidCount === 0) {
      log.warn({ layer: config.collisionLayer }, 'Collision layer has no solid cells');
    }
    return 'activated';
  }

  activeMap(): CollisionMap {
    return this.activeLevel().map;
  }

  activeLevel(): ActiveLevel {
    if (!this.active) {
      throw new NoLevelLoadedError();
    }
    return this.active;
  }

  hasLevel(): boolean {
    return this.active !== null;
  }

  private build(config: LevelConfigT, raw: unknown): ActiveLevel {
    const parsed = parseLevelFile(raw, { level: config.level, collisionLayer: config.collisionLayer });
    const map = buildLayerMap(parsed, config, config.collisionLayer);
    const triggers = config.triggerLayer ? buildLayerMap(parsed, config, config.triggerLayer) : null;
    const { layers: _layers, ...level } = parsed;

    this.generationCounter += 1;
    return { config, level, map, triggers, generation: this.generationCounter };
  }
}
