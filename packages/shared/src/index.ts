export const name = '@recency-cache/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './format-key';
export * from './config/schema';
export * from './config/validation';
