export * from './orchestrator';
export * from './pull_request_opener';
export * from './change_preview';
