import { dataSource } from '../lib/data-source';
import { ConflictError, ValidationError } from '../lib/errors';
import { PaginationHelper } from '../helpers/pagination.helper';
import { roundMoney } from '../helpers/money.helper';
import { isOrderedRange } from '../validators/common.validator';
import { Tenant } from '../entities/tenant.entity';
import { Payment } from '../entities/payment.entity';
import { MaintenanceRequest } from '../entities/maintenance-request.entity';
import { Document } from '../entities/document.entity';
import { PaymentStatus } from '../types/payment.type';
import { findOwnedProperty, findOwnedTenant } from './ownership';
import {
    LEASE_ORDER_MESSAGE,
    type CreateTenantInput,
    type MoveOutInput,
    type TenantListQuery,
    type UpdateTenantInput,
} from '../validators/tenant.validator';

class TenantService {
    private get tenants() {
        return dataSource.getRepository(Tenant);
    }

    async createTenant(ownerId: string, data: CreateTenantInput) {
        const property = await findOwnedProperty(ownerId, data.propertyId);

        return this.tenants.save(
            this.tenants.create({
                propertyId: property.id,
                name: data.name,
                email: data.email ?? null,
                phone: data.phone,
                whatsappNumber: data.whatsappNumber ?? null,
                leaseStart: data.leaseStart ?? null,
                leaseEnd: data.leaseEnd ?? null,
                monthlyRent: data.monthlyRent ?? null,
                securityDeposit: data.securityDeposit,
                isActive: true,
            }),
        );
    }

    async getTenants(ownerId: string, query: TenantListQuery) {
        const [items, total] = await this.tenants.findAndCount({
            where: {
                property: { ownerId },
                propertyId: query.propertyId,
                isActive: query.active,
            },
            order: { name: 'ASC', createdAt: 'ASC' },
            skip: PaginationHelper.getSkip(query.page, query.limit),
            take: PaginationHelper.getLimit(query.limit),
        });

        return PaginationHelper.paginate(items, total, query);
    }

    async getTenantById(ownerId: string, id: string) {
        const { property, ...tenant } = await findOwnedTenant(ownerId, id);
        const totalPaid = await this.getTotalPaid(tenant.id);
        return {
            ...tenant,
            effectiveMonthlyRent: tenant.monthlyRent ?? property.monthlyRent,
            totalPaid,
        };
    }

    /**
     * Sum of the tenant's completed payments.
     */
    async getTotalPaid(tenantId: string): Promise<number> {
        const sum = await dataSource.getRepository(Payment).sum('amount', {
            tenantId,
            status: PaymentStatus.COMPLETED,
        });
        return roundMoney(sum ?? 0);
    }

    async updateTenant(ownerId: string, id: string, data: UpdateTenantInput) {
        const tenant = await findOwnedTenant(ownerId, id);
        const previousPropertyId = tenant.propertyId;

        if (data.propertyId && data.propertyId !== previousPropertyId) {
            const target = await findOwnedProperty(ownerId, data.propertyId);
            const hasPayments = await dataSource.getRepository(Payment).existsBy({ tenantId: tenant.id });
            if (hasPayments) {
                throw new ConflictError('Tenant has recorded payments and cannot be moved to another property');
            }
            tenant.property = target;
        }

        this.tenants.merge(tenant, data);
        this.assertLeaseOrder(tenant);

        // Requests and documents filed at the old property stay there, unlinked from the tenant
        const { property, ...saved } = await dataSource.transaction(async (manager) => {
            if (tenant.propertyId !== previousPropertyId) {
                const filedAtPrevious = { tenantId: tenant.id, propertyId: previousPropertyId };
                await manager.update(MaintenanceRequest, filedAtPrevious, { tenantId: null });
                await manager.update(Document, filedAtPrevious, { tenantId: null });
            }
            return manager.save(tenant);
        });
        return saved;
    }

    async moveOut(ownerId: string, id: string, data: MoveOutInput) {
        const tenant = await findOwnedTenant(ownerId, id);

        tenant.isActive = false;
        if (data.moveOutDate) {
            tenant.leaseEnd = data.moveOutDate;
        }
        this.assertLeaseOrder(tenant);

        const { property, ...saved } = await this.tenants.save(tenant);
        return saved;
    }

    /**
     * Deletes the tenant and their payments. Maintenance requests and documents stay with the property.
     */
    async deleteTenant(ownerId: string, id: string) {
        const tenant = await findOwnedTenant(ownerId, id);

        await dataSource.transaction(async (manager) => {
            await manager.delete(Payment, { tenantId: tenant.id });
            await manager.update(MaintenanceRequest, { tenantId: tenant.id }, { tenantId: null });
            await manager.update(Document, { tenantId: tenant.id }, { tenantId: null });
            await manager.delete(Tenant, { id: tenant.id });
        });

        return { success: true };
    }

    private assertLeaseOrder(tenant: Tenant) {
        if (!isOrderedRange({ from: tenant.leaseStart, to: tenant.leaseEnd })) {
            throw new ValidationError(LEASE_ORDER_MESSAGE);
        }
    }
}

export const tenantService = new TenantService();
