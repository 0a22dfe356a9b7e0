import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LoggerOptions, MaybePromise } from './types';

export { ConsoleLogger, ScopedLogger, JsonlLogger };
