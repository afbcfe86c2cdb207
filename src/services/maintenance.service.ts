import { dataSource } from '../lib/data-source';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { PaginationHelper } from '../helpers/pagination.helper';
import { MaintenanceRequest } from '../entities/maintenance-request.entity';
import { MaintenanceStatus } from '../types/maintenance.type';
import { canTransition } from './maintenance-lifecycle';
import { findOwnedProperty, findOwnedTenant } from './ownership';
import type {
    CreateMaintenanceRequestInput,
    MaintenanceListQuery,
    UpdateMaintenanceRequestInput,
} from '../validators/maintenance.validator';

class MaintenanceService {
    private get requests() {
        return dataSource.getRepository(MaintenanceRequest);
    }

    async createRequest(ownerId: string, data: CreateMaintenanceRequestInput) {
        const property = await findOwnedProperty(ownerId, data.propertyId);
        if (data.tenantId) {
            await this.assertTenantInProperty(ownerId, data.tenantId, property.id);
        }

        return this.requests.save(
            this.requests.create({
                propertyId: property.id,
                tenantId: data.tenantId ?? null,
                issueType: data.issueType,
                description: data.description,
                priority: data.priority,
                status: MaintenanceStatus.OPEN,
                resolvedAt: null,
            }),
        );
    }

    async getRequests(ownerId: string, query: MaintenanceListQuery) {
        const [items, total] = await this.requests.findAndCount({
            where: {
                property: { ownerId },
                propertyId: query.propertyId,
                status: query.status,
                priority: query.priority,
            },
            order: { createdAt: 'DESC' },
            skip: PaginationHelper.getSkip(query.page, query.limit),
            take: PaginationHelper.getLimit(query.limit),
        });

        return PaginationHelper.paginate(items, total, query);
    }

    async getRequestById(ownerId: string, id: string) {
        return this.findOwned(ownerId, id);
    }

    async updateRequest(ownerId: string, id: string, data: UpdateMaintenanceRequestInput) {
        const request = await this.findOwned(ownerId, id);
        if (data.tenantId) {
            await this.assertTenantInProperty(ownerId, data.tenantId, request.propertyId);
        }

        this.requests.merge(request, data);
        return this.requests.save(request);
    }

    /**
     * Moves the request along its lifecycle. Setting the current status again is a no-op.
     */
    async changeStatus(ownerId: string, id: string, status: MaintenanceStatus) {
        const request = await this.findOwned(ownerId, id);

        if (request.status === status) {
            return request;
        }

        if (!canTransition(request.status, status)) {
            throw new ConflictError(`Cannot change status from ${request.status} to ${status}`);
        }

        request.status = status;
        request.resolvedAt = status === MaintenanceStatus.COMPLETED ? new Date() : null;
        return this.requests.save(request);
    }

    async deleteRequest(ownerId: string, id: string) {
        const request = await this.findOwned(ownerId, id);
        await this.requests.delete({ id: request.id });
        return { success: true };
    }

    private async findOwned(ownerId: string, id: string) {
        const request = await this.requests.findOneBy({ id, property: { ownerId } });
        if (!request) {
            throw new NotFoundError('Maintenance request not found');
        }
        return request;
    }

    private async assertTenantInProperty(ownerId: string, tenantId: string, propertyId: string) {
        const tenant = await findOwnedTenant(ownerId, tenantId);
        if (tenant.propertyId !== propertyId) {
            throw new ValidationError('Tenant does not live in the given property');
        }
    }
}

export const maintenanceService = new MaintenanceService();
