export * from './pull-requests';
