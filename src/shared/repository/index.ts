export * from './record-repository';
