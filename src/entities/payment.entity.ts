import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseEntity } from './base.entity';
import { Property } from './property.entity';
import { Tenant } from './tenant.entity';
import { PaymentMethod, PaymentStatus, PaymentType } from '../types/payment.type';

/**
 * A payment made by a tenant. The tenant always lives in the referenced property.
 */
@Entity({ name: 'payment' })
export class Payment extends BaseEntity {
    @ManyToOne(() => Property, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'property_id' })
    property!: Property;

    @Column({ name: 'property_id' })
    @Index()
    propertyId!: string;

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'tenant_id' })
    tenant!: Tenant;

    @Column({ name: 'tenant_id' })
    @Index()
    tenantId!: string;

    @Column({ name: 'amount', type: 'double precision' })
    amount!: number;

    @Column({ name: 'payment_date', type: 'date' })
    paymentDate!: string;

    @Column({
        name: 'payment_method',
        type: 'simple-enum',
        enum: PaymentMethod,
        default: PaymentMethod.CASH,
    })
    paymentMethod!: PaymentMethod;

    @Column({
        name: 'payment_type',
        type: 'simple-enum',
        enum: PaymentType,
        default: PaymentType.RENT,
    })
    paymentType!: PaymentType;

    @Column({
        name: 'status',
        type: 'simple-enum',
        enum: PaymentStatus,
        default: PaymentStatus.COMPLETED,
    })
    status!: PaymentStatus;

    @Column({ name: 'notes', type: 'text', nullable: true })
    notes!: string | null;
}
