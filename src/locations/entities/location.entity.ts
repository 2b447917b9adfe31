/**
 * @fileoverview Location Entity
 *
 * TypeORM entity for the PostgreSQL locations table. Rows belong to a
 * character and are removed with it.
 */

import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { CharacterEntity } from '../../characters/entities';
import { COORDINATE_PRECISION, COORDINATE_SCALE } from '../../shared/geo';
import { decimalTransformer } from './decimal.transformer';

@Entity('locations')
export class LocationEntity {
    @PrimaryGeneratedColumn()
    id!: number;

    @ManyToOne(() => CharacterEntity, { nullable: false, onDelete: 'CASCADE' })
    @JoinColumn({ name: 'character_id' })
    character?: CharacterEntity;

    @Column({ type: 'integer' })
    character_id!: number;

    @Column({ type: 'timestamptz' })
    timestamp!: Date;

    // timestamptz keeps microseconds but the driver hands back a millisecond Date
    @Column({ type: 'smallint', default: 0 })
    timestamp_micros!: number;

    @Column({
        type: 'numeric',
        precision: COORDINATE_PRECISION,
        scale: COORDINATE_SCALE,
        transformer: decimalTransformer,
    })
    lat!: number;

    @Column({
        type: 'numeric',
        precision: COORDINATE_PRECISION,
        scale: COORDINATE_SCALE,
        transformer: decimalTransformer,
    })
    lon!: number;
}
