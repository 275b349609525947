export const name = '@northstar/shared';

export * from './errors';
export * from './types/events';
export * from './types/lifecycle';
export * from './logger';
export * from './redaction';
export * from './config/schema';
export * from './json-utils';
export * from './string-utils';
export * from './fs/io';
export * from './fs/path';
export * from './abort';
