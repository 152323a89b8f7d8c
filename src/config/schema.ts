import { z } from 'zod';

/**
 * Boolean environment flag. Accepts `true`/`false`/`1`/`0` so that an explicit
 * `FLAG=false` in the environment really turns the flag off.
 */
const flag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

/**
 * Centralised configuration schema for instance-forest.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Re-validate the whole forest after every structural mutation (expensive, O(n) per call)
  FOREST_VERIFY_INVARIANTS: flag(false),

  // Fail a descendant iterator that is advanced after its forest was structurally mutated
  FOREST_ITERATION_GUARD: flag(true),
});

export type AppConfig = z.infer<typeof configSchema>;
