import { FindOptionsWhere, Not } from 'typeorm';
import { dataSource } from '../lib/data-source';
import { PaginationHelper } from '../helpers/pagination.helper';
import { roundMoney } from '../helpers/money.helper';
import { containsText } from '../helpers/query.helper';
import { Property } from '../entities/property.entity';
import { Tenant } from '../entities/tenant.entity';
import { Payment } from '../entities/payment.entity';
import { Expense } from '../entities/expense.entity';
import { MaintenanceRequest } from '../entities/maintenance-request.entity';
import { Document } from '../entities/document.entity';
import { PaymentStatus } from '../types/payment.type';
import { MaintenanceStatus } from '../types/maintenance.type';
import { findOwnedProperty } from './ownership';
import type {
    CreatePropertyInput,
    PropertyListQuery,
    PropertySummary,
    UpdatePropertyInput,
} from '../validators/property.validator';

class PropertyService {
    private get properties() {
        return dataSource.getRepository(Property);
    }

    async createProperty(ownerId: string, data: CreatePropertyInput) {
        return this.properties.save(
            this.properties.create({
                ...data,
                address: data.address ?? null,
                ownerId,
            }),
        );
    }

    async getProperties(ownerId: string, query: PropertyListQuery) {
        const base: FindOptionsWhere<Property> = { ownerId, propertyType: query.propertyType };
        const where = query.search
            ? [
                { ...base, name: containsText(query.search) },
                { ...base, address: containsText(query.search) },
            ]
            : base;

        const [items, total] = await this.properties.findAndCount({
            where,
            order: { createdAt: 'DESC', name: 'ASC' },
            skip: PaginationHelper.getSkip(query.page, query.limit),
            take: PaginationHelper.getLimit(query.limit),
        });

        return PaginationHelper.paginate(items, total, query);
    }

    async getPropertyById(ownerId: string, id: string) {
        const property = await findOwnedProperty(ownerId, id);
        const summary = await this.getSummary(property.id);
        return { ...property, summary };
    }

    async getSummary(propertyId: string): Promise<PropertySummary> {
        const [tenantCount, activeTenantCount, totalPayments, totalExpenses, openMaintenanceRequests] =
            await Promise.all([
                dataSource.getRepository(Tenant).countBy({ propertyId }),
                dataSource.getRepository(Tenant).countBy({ propertyId, isActive: true }),
                dataSource.getRepository(Payment).sum('amount', { propertyId, status: PaymentStatus.COMPLETED }),
                dataSource.getRepository(Expense).sum('amount', { propertyId }),
                dataSource.getRepository(MaintenanceRequest).countBy({
                    propertyId,
                    status: Not(MaintenanceStatus.COMPLETED),
                }),
            ]);

        const income = roundMoney(totalPayments ?? 0);
        const expenses = roundMoney(totalExpenses ?? 0);

        return {
            tenantCount,
            activeTenantCount,
            totalPayments: income,
            totalExpenses: expenses,
            netIncome: roundMoney(income - expenses),
            openMaintenanceRequests,
        };
    }

    async updateProperty(ownerId: string, id: string, data: UpdatePropertyInput) {
        const property = await findOwnedProperty(ownerId, id);
        this.properties.merge(property, data);
        return this.properties.save(property);
    }

    /**
     * Removes the property together with everything recorded against it.
     */
    async deleteProperty(ownerId: string, id: string) {
        const property = await findOwnedProperty(ownerId, id);

        await dataSource.transaction(async (manager) => {
            await manager.delete(Payment, { propertyId: property.id });
            await manager.delete(Expense, { propertyId: property.id });
            await manager.delete(MaintenanceRequest, { propertyId: property.id });
            await manager.delete(Document, { propertyId: property.id });
            await manager.delete(Tenant, { propertyId: property.id });
            await manager.delete(Property, { id: property.id });
        });

        return { success: true };
    }
}

export const propertyService = new PropertyService();
