import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseEntity } from './base.entity';
import { Property } from './property.entity';

@Entity({ name: 'tenant' })
export class Tenant extends BaseEntity {
    @ManyToOne(() => Property, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'property_id' })
    property!: Property;

    @Column({ name: 'property_id' })
    @Index()
    propertyId!: string;

    @Column({ name: 'name', length: 100 })
    name!: string;

    @Column({ name: 'email', type: 'varchar', length: 120, nullable: true })
    email!: string | null;

    @Column({ name: 'phone', length: 20 })
    phone!: string;

    @Column({ name: 'whatsapp_number', type: 'varchar', length: 20, nullable: true })
    whatsappNumber!: string | null;

    // YYYY-MM-DD
    @Column({ name: 'lease_start', type: 'date', nullable: true })
    leaseStart!: string | null;

    @Column({ name: 'lease_end', type: 'date', nullable: true })
    leaseEnd!: string | null;

    // Falls back to the property's rent when null
    @Column({ name: 'monthly_rent', type: 'double precision', nullable: true })
    monthlyRent!: number | null;

    @Column({ name: 'security_deposit', type: 'double precision', default: 0 })
    securityDeposit!: number;

    @Column({ name: 'is_active', type: 'boolean', default: true })
    isActive!: boolean;
}
