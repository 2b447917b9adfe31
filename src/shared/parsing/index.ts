export * from './parse-result';
export * from './query-params';
export * from './temporal';
