export { consoleLogger, noopLogger } from './logger';
export { createEventLogger } from './eventLogger';
export type { ILogger } from './logger';
