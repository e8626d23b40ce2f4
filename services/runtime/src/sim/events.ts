import type { Logger } from '@ledge/logger';

import { logger as rootLogger } from '../logger';

export type MovementEventType = 'jumped' | 'landed' | 'head_bump' | 'wall_hit' | 'left_ground';

export interface MovementEvent {
  type: MovementEventType;
  bodyId: string;
  tick: number;
  x: number;
  y: number;
}

export interface RuntimeEvents {
  movement: MovementEvent;
  level_activated: { levelId: string; generation: number };
  level_failed: { levelId: string; error: unknown };
  transition_started: { from: string; to: string; bodyId: string };
}

export type Listener<T> = (payload: T) => void;
export type Unsubscribe = () => void;

type ListenerTable<Events> = { [K in keyof Events]?: Set<Listener<Events[K]>> };

/**
 * Synchronous notification bus. Collaborators (audio, HUD) subscribe here; the simulation never
 * calls into them directly. A throwing listener is logged and the remaining listeners still run.
 */
export class EventBus<Events = RuntimeEvents> {
  private listeners: ListenerTable<Events> = {};
  private readonly logger: Pick<Logger, 'error'>;

  constructor(logger?: Pick<Logger, 'error'>) {
    this.logger = logger ?? rootLogger.child({ module: 'events' });
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.listeners[event];
    if (!set) {
      return;
    }
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (error) {
        this.logger.error({ err: error, event: String(event) }, 'Event listener failed');
      }
    }
  }

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): Unsubscribe {
    const active: Set<Listener<Events[K]>> = this.listeners[event] ?? new Set<Listener<Events[K]>>();
    this.listeners[event] = active;
    active.add(listener);
    return () => {
      active.delete(listener);
      if (active.size === 0 && this.listeners[event] === active) {
        delete this.listeners[event];
      }
    };
  }

  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): Unsubscribe {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      listener(payload);
    });
    return unsubscribe;
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  /** Drops every listener, e.g. when tearing down a session. */
  clear(): void {
    this.listeners = {};
  }
}
