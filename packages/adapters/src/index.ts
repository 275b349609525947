export const name = '@northstar/adapters';

export * from './types';
export * from './base-adapter';
export * from './merge';
export * from './github';
export * from './fake';
