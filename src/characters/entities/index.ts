export * from './character.entity';
