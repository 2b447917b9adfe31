/**
 * @fileoverview Locations Controller
 *
 * HTTP endpoints for location records and the nearby query.
 */

import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Patch, Post, Put, Query } from '@nestjs/common';
import { LocationResponseDto, toLocationResponse } from './dto/location-response.dto';
import { LocationsService } from './locations.service';

@Controller('locations')
export class LocationsController {
    constructor(private readonly locationsService: LocationsService) { }

    @Get()
    async list(): Promise<LocationResponseDto[]> {
        const locations = await this.locationsService.list();
        return locations.map(toLocationResponse);
    }

    /**
     * Locations within `distance` meters of `coordinates` (`lat,lon`), nearest
     * first unless `ascending` is anything but `1`. `character` and
     * `date_range` narrow the candidates.
     */
    @Get('near')
    async near(
        @Query('coordinates') coordinates?: string,
        @Query('distance') distance?: string,
        @Query('ascending') ascending?: string,
        @Query('character') character?: string,
        @Query('date_range') date_range?: string,
    ): Promise<LocationResponseDto[]> {
        const locations = await this.locationsService.near({ coordinates, distance, ascending, character, date_range });
        return locations.map(toLocationResponse);
    }

    @Post()
    async create(@Body() body: unknown): Promise<LocationResponseDto> {
        return toLocationResponse(await this.locationsService.create(body));
    }

    @Get(':id')
    async findOne(@Param('id') id: string): Promise<LocationResponseDto> {
        return toLocationResponse(await this.locationsService.findOne(id));
    }

    @Put(':id')
    async replace(@Param('id') id: string, @Body() body: unknown): Promise<LocationResponseDto> {
        return toLocationResponse(await this.locationsService.replace(id, body));
    }

    @Patch(':id')
    async update(@Param('id') id: string, @Body() body: unknown): Promise<LocationResponseDto> {
        return toLocationResponse(await this.locationsService.update(id, body));
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    async remove(@Param('id') id: string): Promise<void> {
        await this.locationsService.remove(id);
    }
}
