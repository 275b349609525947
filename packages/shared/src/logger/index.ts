import { ConsoleLogger, formatWithBindings } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export { noopLogger } from './noopLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, formatWithBindings };
