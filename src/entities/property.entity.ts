import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseEntity } from './base.entity';
import { Owner } from './owner.entity';
import { PropertyType } from '../types/property.type';

@Entity({ name: 'property' })
export class Property extends BaseEntity {
    @ManyToOne(() => Owner, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'owner_id' })
    owner!: Owner;

    @Column({ name: 'owner_id' })
    @Index()
    ownerId!: string;

    @Column({ name: 'name', length: 200 })
    name!: string;

    @Column({ name: 'address', type: 'varchar', length: 500, nullable: true })
    address!: string | null;

    @Column({
        name: 'property_type',
        type: 'simple-enum',
        enum: PropertyType,
        default: PropertyType.APARTMENT,
    })
    propertyType!: PropertyType;

    @Column({ name: 'bedrooms', type: 'integer', default: 0 })
    bedrooms!: number;

    @Column({ name: 'bathrooms', type: 'integer', default: 0 })
    bathrooms!: number;

    @Column({ name: 'area_sqft', type: 'double precision', default: 0 })
    areaSqft!: number;

    @Column({ name: 'monthly_rent', type: 'double precision', default: 0 })
    monthlyRent!: number;
}
