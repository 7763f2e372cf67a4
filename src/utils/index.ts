export { delay } from './delay.js';
export { withTimeout } from './timeout.js';
export { ConcurrencyLimiter } from './concurrency.js';
export { createLogger, createScanLogger, type LoggerOptions } from './logger.js';
export { normalizeHostname, isIpAddress, isValidHostname, toSubdomainOf, firstLabel, hostForUrl } from './domain.js';
