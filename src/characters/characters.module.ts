/**
 * @fileoverview Characters Module
 */

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CharacterEntity } from './entities';
import { CharactersController } from './characters.controller';
import { CharactersRepository, TypeOrmCharactersRepository } from './characters.repository';
import { CharactersService } from './characters.service';

@Module({
    imports: [TypeOrmModule.forFeature([CharacterEntity])],
    controllers: [CharactersController],
    providers: [
        CharactersService,
        { provide: CharactersRepository, useClass: TypeOrmCharactersRepository },
    ],
    exports: [CharactersRepository],
})
export class CharactersModule { }
