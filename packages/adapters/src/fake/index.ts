export * from './merge';
export * from './pull-requests';
