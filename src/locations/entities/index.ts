export * from './location.entity';
export * from './decimal.transformer';
