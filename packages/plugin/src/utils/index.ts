export { logger, createLogger } from './logger.js';
export { delay, type SleepFn } from './delay.js';
