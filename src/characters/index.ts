/**
 * @fileoverview Characters Barrel Export
 */

export * from './characters.module';
export * from './characters.repository';
export * from './characters.service';
export * from './characters.controller';
export * from './characters.constants';
export * from './interfaces';
export * from './entities';
