/**
 * @fileoverview Character Entity
 *
 * TypeORM entity for the PostgreSQL characters table.
 */

import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

@Entity('characters')
export class CharacterEntity {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar', length: 255 })
    name!: string;

    // pg returns `date` columns as YYYY-MM-DD strings
    @Column({ type: 'date' })
    date_of_birth!: string;

    @Column({ type: 'varchar', length: 255 })
    occupation!: string;

    @Column({ type: 'boolean', default: false })
    is_suspect!: boolean;
}
