export * from './referenced-record-missing.error';
