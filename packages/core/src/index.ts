export const name = '@northstar/core';

export * from './extract';
export * from './execution';
export * from './lifecycle';
export * from './config/loader';
export * from './pipeline';
