import { loadEnvironment } from '@/config/environment';
import { METADATA_TIMINGS, SUPERVISOR_TIMINGS } from '@/config/timings';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => ({
  env: loadEnvironment(env),
  supervisor: { ...SUPERVISOR_TIMINGS },
  metadata: { ...METADATA_TIMINGS },
});

export type AppConfig = ReturnType<typeof loadConfig>;
