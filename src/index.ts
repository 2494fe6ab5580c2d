export { WindowedSequence } from './window/sequence.js';
export { WindowedSet, type WindowedSetOptions } from './window/set.js';
export { TimeWindow, type WindowOptions } from './window/base.js';
export { monotonicClock, elapsedSince, isWithinWindow, type Clock } from './lib/clock.js';
export { loadConfig, defaultWindowMs, parseWindowMs, WindowMsSchema, type AppConfig } from './config.js';
export { InvalidWindowError, ConfigError, isInvalidWindowError, isConfigError } from './lib/errors.js';
export { logger } from './logger.js';
