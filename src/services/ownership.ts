import { dataSource } from '../lib/data-source';
import { NotFoundError } from '../lib/errors';
import { Property } from '../entities/property.entity';
import { Tenant } from '../entities/tenant.entity';

/**
 * Property owned by `ownerId`. Another owner's property is reported as missing.
 */
export async function findOwnedProperty(ownerId: string, propertyId: string): Promise<Property> {
    const property = await dataSource.getRepository(Property).findOne({
        where: { id: propertyId, ownerId },
    });

    if (!property) {
        throw new NotFoundError('Property not found');
    }

    return property;
}

export async function findOwnedTenant(ownerId: string, tenantId: string): Promise<Tenant> {
    const tenant = await dataSource.getRepository(Tenant).findOne({
        where: { id: tenantId, property: { ownerId } },
        relations: { property: true },
    });

    if (!tenant) {
        throw new NotFoundError('Tenant not found');
    }

    return tenant;
}

export async function ownedPropertyIds(ownerId: string): Promise<string[]> {
    const properties = await dataSource.getRepository(Property).find({
        where: { ownerId },
        select: { id: true },
    });
    return properties.map((property) => property.id);
}
