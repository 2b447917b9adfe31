export * from './character.interface';
