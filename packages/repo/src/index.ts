export const name = '@northstar/repo';

export * from './git';
export * from './workspace';
export * from './branch';
