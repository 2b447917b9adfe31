export * from './coordinates';
export * from './great-circle';
