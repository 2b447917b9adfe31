export * from './record-metrics';
