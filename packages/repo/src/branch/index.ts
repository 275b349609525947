export * from './allocator';
export * from './committer';
