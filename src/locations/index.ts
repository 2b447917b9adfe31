/**
 * @fileoverview Locations Barrel Export
 */

export * from './locations.module';
export * from './locations.repository';
export * from './locations.service';
export * from './locations.controller';
export * from './locations.constants';
export * from './interfaces';
export * from './entities';
