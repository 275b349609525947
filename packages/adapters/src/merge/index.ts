export * from './fast-apply';
