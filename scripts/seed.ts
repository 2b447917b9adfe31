/**
 * Seed script for local development
 * Synchronises the PostgreSQL schema and populates it with sample characters and locations
 */

import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { CharacterEntity } from '../src/characters/entities';
import { LocationEntity } from '../src/locations/entities';

// Configuration
const dataSource = new DataSource({
    type: 'postgres',
    host: process.env.POSTGRES_HOST ?? 'localhost',
    port: Number(process.env.POSTGRES_PORT ?? 5432),
    username: process.env.POSTGRES_USER ?? 'postgres',
    password: process.env.POSTGRES_PASSWORD ?? 'postgres',
    database: process.env.POSTGRES_DB ?? 'character_locations',
    entities: [CharacterEntity, LocationEntity],
    synchronize: true,
});

interface SampleCharacter {
    name: string;
    date_of_birth: string;
    occupation: string;
    is_suspect: boolean;
    sightings: Array<{ timestamp: string; lat: number; lon: number }>;
}

// Mock data
const sampleCharacters: SampleCharacter[] = [
    {
        name: 'Ada Example',
        date_of_birth: '1985-03-12',
        occupation: 'Cartographer',
        is_suspect: false,
        sightings: [
            { timestamp: '2024-01-05T09:30:00Z', lat: 10, lon: 10 },
            { timestamp: '2024-01-06T14:00:00Z', lat: 10.001, lon: 10.002 },
        ],
    },
    {
        name: 'Bram Sample',
        date_of_birth: '1979-11-02',
        occupation: 'Locksmith',
        is_suspect: true,
        sightings: [
            { timestamp: '2024-01-05T22:15:00Z', lat: 10.01, lon: 9.99 },
            { timestamp: '2024-01-07T03:45:00Z', lat: 40.4168, lon: -3.7038 },
        ],
    },
    {
        name: 'Cora Placeholder',
        date_of_birth: '1992-07-24',
        occupation: 'Night porter',
        is_suspect: true,
        sightings: [{ timestamp: '2024-01-06T01:00:00Z', lat: 51.5074, lon: -0.1278 }],
    },
    {
        name: 'Dev Fixture',
        date_of_birth: '2001-01-30',
        occupation: 'Courier',
        is_suspect: false,
        sightings: [],
    },
];

async function seed(): Promise<void> {
    const characters = dataSource.getRepository(CharacterEntity);
    const locations = dataSource.getRepository(LocationEntity);

    console.log('Clearing existing records...');
    await locations.createQueryBuilder().delete().execute();
    await characters.createQueryBuilder().delete().execute();

    console.log('Seeding characters and locations...');
    for (const { sightings, ...fields } of sampleCharacters) {
        const character = await characters.save(characters.create(fields));
        for (const sighting of sightings) {
            await locations.save(locations.create({
                character_id: character.id,
                timestamp: new Date(sighting.timestamp),
                timestamp_micros: 0,
                lat: sighting.lat,
                lon: sighting.lon,
            }));
        }
        console.log(`   Added: ${character.name} (${sightings.length} locations)`);
    }
}

async function main(): Promise<void> {
    console.log('\nCharacter Locations Seed Script\n');

    try {
        await dataSource.initialize();
        await seed();
        console.log('\nSeeding complete!\n');
        console.log('Next steps:');
        console.log('  1. npm start');
        console.log('  2. curl "http://localhost:3000/locations/near/?coordinates=10,10&distance=2000"');
        console.log('');
    } catch (error) {
        console.error('\nSeeding failed:', error);
        process.exitCode = 1;
    } finally {
        if (dataSource.isInitialized) {
            await dataSource.destroy();
        }
    }
}

void main();
