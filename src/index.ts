export * from './challenge-client/index';
export * from './challenge-core/index';
export { createLogger, silentLogger, type Logger } from './shared/logger';
export type { LogLevel, RequestOptions } from './shared/types';
