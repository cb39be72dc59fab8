import { ConsoleLogger, SilentLogger } from './consoleLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export { ConsoleLogger, SilentLogger };
