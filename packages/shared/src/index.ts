export {
  type LogLevel,
  LogLevelSchema,
  loadEnv,
  type SharedConfig,
  sharedConfigSchema,
} from './config.js';
export { type CreateLoggerOptions, createLogger, type Logger } from './logger.js';
export { DOTS_PULSE_MS, RING_ROTATION_MS, SHIMMER_SWEEP_MS, WAVE_TRAVEL_MS } from './timings.js';
