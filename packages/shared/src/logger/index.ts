import { ConsoleLogger, SilentLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, SilentLogger };
