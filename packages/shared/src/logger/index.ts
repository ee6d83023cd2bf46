export { ConsoleLogger } from './consoleLogger';
export type { Logger, LogLevel } from './types';
