import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import {
    booleanQuerySchema,
    idSchema,
    isOrderedRange,
    isoDateSchema,
    moneySchema,
    paginationQuerySchema,
} from './common.validator';

extendZodWithOpenApi(z);

export const LEASE_ORDER_MESSAGE = 'leaseEnd must not be before leaseStart';

const tenantFields = z.object({
    propertyId: idSchema,
    name: z.string().trim().min(1).max(100).openapi({ example: 'Grace Hopper' }),
    email: z.string().email().max(120).optional().openapi({ example: 'grace@example.com' }),
    phone: z.string().min(3).max(20).openapi({ example: '+15550101' }),
    whatsappNumber: z.string().min(3).max(20).optional().openapi({ example: '+15550101' }),
    leaseStart: isoDateSchema.optional(),
    leaseEnd: isoDateSchema.optional(),
    monthlyRent: moneySchema.optional().openapi({ description: "Defaults to the property's monthly rent" }),
    securityDeposit: moneySchema.default(0).openapi({ example: 2400 }),
});

export const createTenantSchema = tenantFields
    .refine((data) => isOrderedRange({ from: data.leaseStart, to: data.leaseEnd }), {
        message: LEASE_ORDER_MESSAGE,
        path: ['leaseEnd'],
    })
    .openapi('CreateTenantRequest');

export const updateTenantSchema = tenantFields
    .partial()
    .extend({ isActive: z.boolean().optional() })
    .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' })
    .refine((data) => isOrderedRange({ from: data.leaseStart, to: data.leaseEnd }), {
        message: LEASE_ORDER_MESSAGE,
        path: ['leaseEnd'],
    })
    .openapi('UpdateTenantRequest');

export const moveOutSchema = z
    .object({
        moveOutDate: isoDateSchema.optional().openapi({ description: 'Recorded as the lease end' }),
    })
    .openapi('MoveOutRequest');

export const tenantListQuerySchema = paginationQuerySchema.extend({
    propertyId: idSchema.optional(),
    active: booleanQuerySchema.optional(),
});

export const tenantResponseSchema = z
    .object({
        id: z.string(),
        propertyId: z.string(),
        name: z.string(),
        email: z.string().nullable(),
        phone: z.string(),
        whatsappNumber: z.string().nullable(),
        leaseStart: z.string().nullable(),
        leaseEnd: z.string().nullable(),
        monthlyRent: z.number().nullable(),
        securityDeposit: z.number(),
        isActive: z.boolean(),
        effectiveMonthlyRent: z.number().optional(),
        totalPaid: z.number().optional(),
    })
    .openapi('Tenant');

export type CreateTenantInput = z.infer<typeof createTenantSchema>;
export type UpdateTenantInput = z.infer<typeof updateTenantSchema>;
export type MoveOutInput = z.infer<typeof moveOutSchema>;
export type TenantListQuery = z.infer<typeof tenantListQuerySchema>;
