import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseEntity } from './base.entity';
import { Property } from './property.entity';
import { ExpenseCategory } from '../types/expense.type';

@Entity({ name: 'expense' })
export class Expense extends BaseEntity {
    @ManyToOne(() => Property, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'property_id' })
    property!: Property;

    @Column({ name: 'property_id' })
    @Index()
    propertyId!: string;

    @Column({
        name: 'category',
        type: 'simple-enum',
        enum: ExpenseCategory,
        default: ExpenseCategory.OTHER,
    })
    category!: ExpenseCategory;

    @Column({ name: 'description', type: 'text', nullable: true })
    description!: string | null;

    @Column({ name: 'amount', type: 'double precision' })
    amount!: number;

    @Column({ name: 'expense_date', type: 'date' })
    expenseDate!: string;

    @Column({ name: 'vendor', type: 'varchar', length: 200, nullable: true })
    vendor!: string | null;

    @Column({ name: 'receipt_url', type: 'varchar', length: 500, nullable: true })
    receiptUrl!: string | null;
}
