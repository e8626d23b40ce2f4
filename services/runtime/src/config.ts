import 'dotenv/config';

import { z } from 'zod';

import { type MovementTuning, resolveMovementTuning } from '@ledge/tuning';

const optionalNumber = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  });

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).catch('development'),
  LEVEL_CATALOG: z.string().min(1).catch('levels/catalog.json'),
  START_LEVEL: z.string().min(1).optional().catch(undefined),
  RUN_TICKS: z.coerce.number().int().min(0).catch(600),
  INPUT_SCRIPT: z.string().min(1).optional().catch(undefined),
  METRICS_PORT: z.coerce.number().int().min(1).max(65535).optional().catch(undefined),
  SIM_STEP_HZ: optionalNumber,
  SIM_GRAVITY: optionalNumber,
  SIM_JUMP_SPEED: optionalNumber,
  SIM_COYOTE_MS: optionalNumber,
  SIM_JUMP_BUFFER_MS: optionalNumber,
});

export interface RuntimeConfig {
  env: 'development' | 'test' | 'production';
  levelCatalog: string;
  startLevel?: string;
  runTicks: number;
  inputScript?: string;
  metricsPort?: number;
  tuning: MovementTuning;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    levelCatalog: parsed.LEVEL_CATALOG,
    startLevel: parsed.START_LEVEL,
    runTicks: parsed.RUN_TICKS,
    inputScript: parsed.INPUT_SCRIPT,
    metricsPort: parsed.METRICS_PORT,
    tuning: resolveMovementTuning({
      stepHz: parsed.SIM_STEP_HZ,
      gravity: parsed.SIM_GRAVITY,
      jumpSpeed: parsed.SIM_JUMP_SPEED,
      coyoteMs: parsed.SIM_COYOTE_MS,
      jumpBufferMs: parsed.SIM_JUMP_BUFFER_MS,
    }),
  };
}
