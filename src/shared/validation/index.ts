export * from './field-messages';
export * from './fields';
