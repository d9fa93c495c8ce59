export type { Logger } from './types';
export { ConsoleLogger } from './consoleLogger';
