import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { PropertyType } from '../types/property.type';
import { moneySchema, paginationQuerySchema } from './common.validator';

extendZodWithOpenApi(z);

const propertyFields = z.object({
    name: z.string().trim().min(1).max(200).openapi({ example: 'Maple Court, Unit 4' }),
    address: z.string().max(500).optional().openapi({ example: '12 Maple Court, Springfield' }),
    propertyType: z.nativeEnum(PropertyType).default(PropertyType.APARTMENT).openapi({ example: PropertyType.APARTMENT }),
    bedrooms: z.number().int().min(0).default(0).openapi({ example: 2 }),
    bathrooms: z.number().int().min(0).default(0).openapi({ example: 1 }),
    areaSqft: moneySchema.default(0).openapi({ example: 850 }),
    monthlyRent: moneySchema.default(0).openapi({ example: 1200 }),
});

export const createPropertySchema = propertyFields.openapi('CreatePropertyRequest');

export const updatePropertySchema = propertyFields
    .partial()
    .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' })
    .openapi('UpdatePropertyRequest');

export const propertyListQuerySchema = paginationQuerySchema.extend({
    propertyType: z.nativeEnum(PropertyType).optional(),
    search: z.string().trim().min(1).max(100).optional(),
});

export const propertyResponseSchema = z
    .object({
        id: z.string(),
        ownerId: z.string(),
        name: z.string(),
        address: z.string().nullable(),
        propertyType: z.nativeEnum(PropertyType),
        bedrooms: z.number(),
        bathrooms: z.number(),
        areaSqft: z.number(),
        monthlyRent: z.number(),
        createdAt: z.string().datetime(),
        updatedAt: z.string().datetime(),
    })
    .openapi('Property');

export const propertySummarySchema = z
    .object({
        tenantCount: z.number(),
        activeTenantCount: z.number(),
        totalPayments: z.number(),
        totalExpenses: z.number(),
        netIncome: z.number(),
        openMaintenanceRequests: z.number(),
    })
    .openapi('PropertySummary');

export type CreatePropertyInput = z.infer<typeof createPropertySchema>;
export type UpdatePropertyInput = z.infer<typeof updatePropertySchema>;
export type PropertyListQuery = z.infer<typeof propertyListQuerySchema>;
export type PropertySummary = z.infer<typeof propertySummarySchema>;
