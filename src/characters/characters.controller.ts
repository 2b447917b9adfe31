/**
 * @fileoverview Characters Controller
 *
 * HTTP endpoints for character records.
 */

import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Patch, Post, Put, Query } from '@nestjs/common';
import { CharactersService } from './characters.service';
import { Character } from './interfaces';

@Controller('characters')
export class CharactersController {
    constructor(private readonly charactersService: CharactersService) { }

    /**
     * Lists characters. `orderBy` and `ascending` are mandatory; `name`,
     * `suspect` and `occupation` are combined with OR.
     */
    @Get()
    async list(
        @Query('orderBy') orderBy?: string,
        @Query('ascending') ascending?: string,
        @Query('name') name?: string,
        @Query('suspect') suspect?: string,
        @Query('occupation') occupation?: string,
    ): Promise<Character[]> {
        return this.charactersService.list({ orderBy, ascending, name, suspect, occupation });
    }

    @Post()
    async create(@Body() body: unknown): Promise<Character> {
        return this.charactersService.create(body);
    }

    @Get(':id')
    async findOne(@Param('id') id: string): Promise<Character> {
        return this.charactersService.findOne(id);
    }

    @Put(':id')
    async replace(@Param('id') id: string, @Body() body: unknown): Promise<Character> {
        return this.charactersService.replace(id, body);
    }

    @Patch(':id')
    async update(@Param('id') id: string, @Body() body: unknown): Promise<Character> {
        return this.charactersService.update(id, body);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    async remove(@Param('id') id: string): Promise<void> {
        await this.charactersService.remove(id);
    }
}
