export { logger, createServiceLogger, log, type ServiceLogger } from './logger.js';
