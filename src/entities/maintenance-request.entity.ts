import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseEntity } from './base.entity';
import { Property } from './property.entity';
import { Tenant } from './tenant.entity';
import {
    MaintenanceIssueType,
    MaintenancePriority,
    MaintenanceStatus,
} from '../types/maintenance.type';

@Entity({ name: 'maintenance_request' })
export class MaintenanceRequest extends BaseEntity {
    @ManyToOne(() => Property, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'property_id' })
    property!: Property;

    @Column({ name: 'property_id' })
    @Index()
    propertyId!: string;

    @ManyToOne(() => Tenant, { nullable: true, onDelete: 'SET NULL' })
    @JoinColumn({ name: 'tenant_id' })
    tenant!: Tenant | null;

    @Column({ name: 'tenant_id', type: 'varchar', nullable: true })
    tenantId!: string | null;

    @Column({
        name: 'issue_type',
        type: 'simple-enum',
        enum: MaintenanceIssueType,
        default: MaintenanceIssueType.OTHER,
    })
    issueType!: MaintenanceIssueType;

    @Column({ name: 'description', type: 'text' })
    description!: string;

    @Column({
        name: 'priority',
        type: 'simple-enum',
        enum: MaintenancePriority,
        default: MaintenancePriority.MEDIUM,
    })
    priority!: MaintenancePriority;

    @Column({
        name: 'status',
        type: 'simple-enum',
        enum: MaintenanceStatus,
        default: MaintenanceStatus.OPEN,
    })
    status!: MaintenanceStatus;

    @Column({ name: 'resolved_at', type: 'datetime', nullable: true })
    resolvedAt!: Date | null;
}
