import stringify from 'fast-json-stable-stringify';
import { z } from 'zod';

import type { MovementParams } from '@ledge/tuning';

import type { CollisionMap } from '../collision/map';
import { type KinematicBody, type SpawnSpec, spawnBody } from './body';
import type { MovementEvent } from './events';
import type { InputSample } from './input';
import { stepBody } from './resolver';

/** Input change at tick `t`. `axis` holds until changed; `jump` presses on that tick only. */
export const InputCmd = z.object({
  t: z.number().int().min(0),
  axis: z.number().finite().min(-1).max(1).optional(),
  jump: z.boolean().optional(),
});
export type InputCmd = z.infer<typeof InputCmd>;

export const InputScript = z.array(InputCmd);

export interface ReplayOptions {
  spawn: SpawnSpec;
  params: MovementParams;
  dt: number;
  ticks: number;
  bodyId?: string;
  /** Ends the run early once it returns true. */
  stopWhen?: (body: KinematicBody, tick: number) => boolean;
}

export interface ReplayResult {
  body: KinematicBody;
  events: MovementEvent[];
  ticks: number;
  fingerprint: string;
}

/** Commands sharing a tick are folded into one; later fields win. */
export function mergeCommands(commands: readonly InputCmd[]): InputCmd[] {
  const byTick = new Map<number, InputCmd>();
  for (const command of commands) {
    const merged: InputCmd = { ...(byTick.get(command.t) ?? { t: command.t }) };
    if (command.axis !== undefined) {
      merged.axis = command.axis;
    }
    if (command.jump !== undefined) {
      merged.jump = merged.jump === true || command.jump;
    }
    byTick.set(command.t, merged);
  }
  return [...byTick.values()].sort((a, b) => a.t - b.t);
}

function applyCommand(previous: InputSample, command: InputCmd | undefined): InputSample {
  if (!command) {
    return { axis: previous.axis, jumpPressed: false };
  }
  return { axis: command.axis ?? previous.axis, jumpPressed: command.jump === true };
}

/** Stable digest of the state a replay ends in; equal inputs give equal strings. */
export function fingerprint(body: KinematicBody, ticks: number): string {
  const round = (value: number) => Math.round(value * 1e6) / 1e6;
  return stringify({
    ticks,
    x: round(body.x),
    y: round(body.y),
    vx: round(body.vx),
    vy: round(body.vy),
    grounded: body.grounded,
  });
}

/** Drives a single body through `commands` against a fixed map, without the event bus. */
export function runScript(map: CollisionMap, commands: readonly InputCmd[], options: ReplayOptions): ReplayResult {
  if (!Number.isInteger(options.ticks) || options.ticks < 0) {
    throw new RangeError(`Tick count must be a non-negative integer, got ${options.ticks}`);
  }

  const queue = mergeCommands(InputScript.parse(commands));
  let body = spawnBody(options.bodyId ?? 'player', options.spawn, options.params);
  let input: InputSample = { axis: 0, jumpPressed: false };
  const events: MovementEvent[] = [];

  let index = 0;
  let tick = 0;
  while (tick < options.ticks) {
    const command = queue[index]?.t === tick ? queue[index] : undefined;
    if (command) {
      index += 1;
    }
    input = applyCommand(input, command);

    const result = stepBody(body, input, map, options.dt, tick);
    body = result.body;
    events.push(...result.events);
    tick += 1;

    if (options.stopWhen?.(body, tick)) {
      break;
    }
  }

  return { body, events, ticks: tick, fingerprint: fingerprint(body, tick) };
}
