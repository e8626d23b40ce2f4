import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { MovementEventType } from './sim/events';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const simulationStepsTotal = new Counter({
  name: 'simulation_steps_total',
  help: 'Total number of fixed simulation steps run',
  registers: [registry],
});

export const movementEventsTotal = new Counter({
  name: 'movement_events_total',
  help: 'Movement notifications emitted by the resolver',
  labelNames: ['type'],
  registers: [registry],
});

export const levelLoadsTotal = new Counter({
  name: 'level_loads_total',
  help: 'Level load attempts by outcome',
  labelNames: ['status'],
  registers: [registry],
});

export const levelLoadDurationSeconds = new Histogram({
  name: 'level_load_duration_seconds',
  help: 'Time from load request to activation or failure',
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

export type LevelLoadStatus = 'activated' | 'superseded' | 'failed';

export function recordLevelLoad(status: LevelLoadStatus, startedAtMs?: number): void {
  levelLoadsTotal.labels(status).inc();
  if (startedAtMs !== undefined) {
    levelLoadDurationSeconds.observe((performance.now() - startedAtMs) / 1000);
  }
}

export function recordSteps(count: number): void {
  if (count > 0) {
    simulationStepsTotal.inc(count);
  }
}

export function recordMovementEvent(type: MovementEventType): void {
  movementEventsTotal.labels(type).inc();
}
