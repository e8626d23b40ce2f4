import type { LevelConfigT } from '@ledge/level-format';
import type { Logger } from '@ledge/logger';
import { type MovementParams, type MovementTuning, movementParams, stepSeconds } from '@ledge/tuning';

import type { Vec2 } from '../collision/map';
import type { LevelRegistry, LoadOutcome } from '../level/registry';
import { LevelTransition, findTriggerCell } from '../level/transition';
import { logger as rootLogger } from '../logger';
import { recordMovementEvent, recordSteps } from '../metrics';
import { type KinematicBody, spawnBody } from './body';
import { EventBus } from './events';
import { type InputSample, NEUTRAL_INPUT, sanitizeInput } from './input';
import { FixedStepLoop } from './loop';
import { stepBody } from './resolver';

export interface SpawnOptions {
  /** Defaults to the active level's start point. */
  position?: Vec2;
  halfWidth: number;
  halfHeight: number;
  params?: MovementParams;
  /** Whether touching a trigger cell moves this actor to the next level. */
  followsTransitions?: boolean;
}

export interface SimulationOptions {
  registry: LevelRegistry;
  tuning: MovementTuning;
  /** Looks up the config of the level a trigger leads to. */
  resolveLevel?: (id: string) => LevelConfigT | null;
  events?: EventBus;
  fadeSeconds?: number;
  logger?: Logger;
}

interface Actor {
  body: KinematicBody;
  input: InputSample;
  followsTransitions: boolean;
}

/**
 * Per-step pipeline: read input, resolve every body against the active map, publish events, then
 * check level triggers. The map is read once per step, so a level swap lands between steps.
 */
export class Simulation {
  readonly loop: FixedStepLoop;
  readonly events: EventBus;
  readonly transition: LevelTransition;

  private readonly actors = new Map<string, Actor>();
  private readonly registry: LevelRegistry;
  private readonly params: MovementParams;
  private readonly resolveLevel: (id: string) => LevelConfigT | null;
  private readonly logger: Logger;
  private pendingLoad: Promise<void> = Promise.resolve();

  constructor(options: SimulationOptions) {
    this.registry = options.registry;
    this.params = movementParams(options.tuning);
    this.loop = new FixedStepLoop(stepSeconds(options.tuning), options.tuning.maxFrameSeconds);
    this.events = options.events ?? new EventBus();
    this.transition = new LevelTransition(options.fadeSeconds);
    this.resolveLevel = options.resolveLevel ?? (() => null);
    this.logger = options.logger ?? rootLogger.child({ module: 'simulation' });
  }

  spawn(id: string, options: SpawnOptions): Readonly<KinematicBody> {
    if (this.actors.has(id)) {
      throw new Error(`Body "${id}" already exists`);
    }
    const position = options.position ?? this.registry.activeLevel().config.start;
    const body = spawnBody(
      id,
      { x: position.x, y: position.y, halfWidth: options.halfWidth, halfHeight: options.halfHeight },
      options.params ?? this.params,
    );
    this.actors.set(id, { body, input: { ...NEUTRAL_INPUT }, followsTransitions: options.followsTransitions ?? false });
    this.logger.debug({ bodyId: id, x: body.x, y: body.y }, 'Body spawned');
    return { ...body };
  }

  despawn(id: string): boolean {
    return this.actors.delete(id);
  }

  /** Copy of the body; it changes only through steps and level changes. */
  body(id: string): Readonly<KinematicBody> {
    return { ...this.actor(id).body };
  }

  bodies(): Readonly<KinematicBody>[] {
    return [...this.actors.values()].map((actor) => ({ ...actor.body }));
  }

  inputOf(id: string): Readonly<InputSample> {
    return this.actor(id).input;
  }

  /** Sets the held axis; a jump press is latched until the next step consumes it. */
  setInput(id: string, sample: InputSample): void {
    const actor = this.actor(id);
    const clean = sanitizeInput(sample);
    actor.input = { axis: clean.axis, jumpPressed: actor.input.jumpPressed || clean.jumpPressed };
  }

  /** Banks real frame time and runs the whole steps it covers. */
  advance(frameSeconds: number): number {
    return this.loop.advance(frameSeconds, (tick, dt) => this.runStep(tick, dt));
  }

  stepOnce(): void {
    this.loop.step((tick, dt) => this.runStep(tick, dt));
  }

  /** Loads `config` and moves transition-following actors to its start point. */
  async enterLevel(config: LevelConfigT): Promise<LoadOutcome> {
    const outcome = await this.registry.loadLevel(config);
    if (outcome !== 'activated') {
      return outcome;
    }

    const { generation } = this.registry.activeLevel();
    for (const [id, actor] of this.actors) {
      if (!actor.followsTransitions) {
        this.actors.delete(id);
        continue;
      }
      actor.body = spawnBody(
        id,
        { x: config.start.x, y: config.start.y, halfWidth: actor.body.halfWidth, halfHeight: actor.body.halfHeight },
        actor.body.params,
      );
      actor.input = { ...NEUTRAL_INPUT };
    }
    this.events.emit('level_activated', { levelId: config.id, generation });
    return outcome;
  }

  /** Resolves once the level load started by the last transition has finished. */
  async settled(): Promise<void> {
    await this.pendingLoad;
  }

  private actor(id: string): Actor {
    const actor = this.actors.get(id);
    if (!actor) {
      throw new Error(`Unknown body "${id}"`);
    }
    return actor;
  }

  private runStep(tick: number, dt: number): void {
    const level = this.registry.activeLevel();

    for (const actor of this.actors.values()) {
      const result = stepBody(actor.body, actor.input, level.map, dt, tick);
      actor.body = result.body;
      actor.input = { axis: actor.input.axis, jumpPressed: false };
      for (const event of result.events) {
        recordMovementEvent(event.type);
        this.events.emit('movement', event);
      }

      if (actor.followsTransitions && level.triggers && level.config.next && !this.transition.inProgress) {
        if (findTriggerCell(level.triggers, actor.body)) {
          this.beginTransition(level.config, level.config.next, actor.body.id);
        }
      }
    }

    const switchTo = this.transition.update(dt);
    if (switchTo) {
      this.pendingLoad = this.enterLevel(switchTo).then(
        (outcome) => {
          this.logger.info({ levelId: switchTo.id, outcome }, 'Level transition finished');
        },
        (error: unknown) => {
          this.logger.error({ err: error, levelId: switchTo.id }, 'Level transition failed; staying on the current level');
          this.events.emit('level_failed', { levelId: switchTo.id, error });
        },
      );
    }
    recordSteps(1);
  }

  private beginTransition(from: LevelConfigT, nextId: string, bodyId: string): void {
    const target = this.resolveLevel(nextId);
    if (!target) {
      this.logger.warn({ from: from.id, next: nextId }, 'Trigger leads to an unknown level');
      return;
    }
    if (this.transition.start(target)) {
      this.logger.info({ from: from.id, to: target.id, bodyId }, 'Level transition started');
      this.events.emit('transition_started', { from: from.id, to: target.id, bodyId });
    }
  }
}
