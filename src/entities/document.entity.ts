import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Property } from './property.entity';
import { Tenant } from './tenant.entity';
import { DocumentType } from '../types/document.type';

/**
 * Metadata for a file stored elsewhere (lease scan, insurance policy, inspection report).
 */
@Entity({ name: 'document' })
export class Document {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

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
        name: 'document_type',
        type: 'simple-enum',
        enum: DocumentType,
        default: DocumentType.OTHER,
    })
    documentType!: DocumentType;

    @Column({ name: 'file_name', length: 200 })
    fileName!: string;

    @Column({ name: 'file_url', length: 500 })
    fileUrl!: string;

    @CreateDateColumn({ name: 'uploaded_at', type: 'datetime' })
    uploadedAt!: Date;
}
