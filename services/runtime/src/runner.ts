import { readFile } from 'node:fs/promises';

import type { RuntimeConfig } from './config';
import { findLevelConfig, loadCatalog } from './level/source';
import { LevelRegistry } from './level/registry';
import { logger } from './logger';
import { type MetricsServerHandle, startMetricsServer } from './metrics-server';
import { InputScript, type InputCmd, fingerprint, mergeCommands } from './sim/replay';
import { Simulation } from './sim/simulation';

const PLAYER_ID = 'player';
const PLAYER_HALF_WIDTH = 6;
const PLAYER_HALF_HEIGHT = 8;

export interface RunSummary {
  levelId: string;
  ticks: number;
  fingerprint: string;
}

async function readScript(scriptPath: string | undefined): Promise<InputCmd[]> {
  if (!scriptPath) {
    return [];
  }
  const text = await readFile(scriptPath, 'utf8');
  return mergeCommands(InputScript.parse(JSON.parse(text)));
}

/** Replays the input script headlessly; the metrics server lives exactly as long as the run. */
export async function runRuntime(cfg: RuntimeConfig): Promise<RunSummary> {
  let metricsServer: MetricsServerHandle | null = null;
  if (cfg.metricsPort !== undefined) {
    metricsServer = await startMetricsServer(cfg.metricsPort);
  }

  try {
    return await replay(cfg);
  } finally {
    await metricsServer?.close();
  }
}

async function replay(cfg: RuntimeConfig): Promise<RunSummary> {
  const { catalog, reader } = await loadCatalog(cfg.levelCatalog);
  const startId = cfg.startLevel ?? catalog.start;
  const startConfig = findLevelConfig(catalog, startId);
  if (!startConfig) {
    throw new Error(`Start level "${startId}" is not in the catalog`);
  }

  const registry = new LevelRegistry({ reader });
  const simulation = new Simulation({
    registry,
    tuning: cfg.tuning,
    resolveLevel: (id) => findLevelConfig(catalog, id),
  });

  simulation.events.on('movement', (event) => logger.debug(event, 'Movement event'));
  simulation.events.on('transition_started', (payload) => logger.info(payload, 'Transition started'));
  simulation.events.on('level_activated', (payload) => logger.info(payload, 'Level active'));

  await simulation.enterLevel(startConfig);
  simulation.spawn(PLAYER_ID, {
    halfWidth: PLAYER_HALF_WIDTH,
    halfHeight: PLAYER_HALF_HEIGHT,
    followsTransitions: true,
  });

  const script = await readScript(cfg.inputScript);
  let next = 0;
  for (let tick = 0; tick < cfg.runTicks; tick += 1) {
    const command = script[next]?.t === tick ? script[next] : undefined;
    if (command) {
      next += 1;
      simulation.setInput(PLAYER_ID, {
        axis: command.axis ?? simulation.inputOf(PLAYER_ID).axis,
        jumpPressed: command.jump === true,
      });
    }
    simulation.stepOnce();
    await simulation.settled();
  }

  const summary: RunSummary = {
    levelId: registry.activeLevel().config.id,
    ticks: simulation.loop.tick,
    fingerprint: fingerprint(simulation.body(PLAYER_ID), simulation.loop.tick),
  };
  logger.info(summary, 'Run finished');
  return summary;
}
