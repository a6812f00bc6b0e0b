import { ConsoleLogger } from './consoleLogger';
import { isLogLevel } from './types';

export type { Logger, LogLevel } from './types';
export { LOG_LEVELS, isLogLevel } from './types';

const envLevel = process.env.PROJPICK_LOG_LEVEL;

export const logger = new ConsoleLogger({
  level: envLevel && isLogLevel(envLevel) ? envLevel : 'warn',
});
export { ConsoleLogger };
