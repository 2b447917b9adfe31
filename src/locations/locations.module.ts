/**
 * @fileoverview Locations Module
 */

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CharactersModule } from '../characters/characters.module';
import { LocationEntity } from './entities';
import { LocationsController } from './locations.controller';
import { LocationsRepository, TypeOrmLocationsRepository } from './locations.repository';
import { LocationsService } from './locations.service';

@Module({
    imports: [TypeOrmModule.forFeature([LocationEntity]), CharactersModule],
    controllers: [LocationsController],
    providers: [
        LocationsService,
        { provide: LocationsRepository, useClass: TypeOrmLocationsRepository },
    ],
})
export class LocationsModule { }
