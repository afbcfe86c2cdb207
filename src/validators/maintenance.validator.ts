import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import {
    MaintenanceIssueType,
    MaintenancePriority,
    MaintenanceStatus,
} from '../types/maintenance.type';
import { idSchema, paginationQuerySchema } from './common.validator';

extendZodWithOpenApi(z);

export const createMaintenanceRequestSchema = z
    .object({
        propertyId: idSchema,
        tenantId: idSchema.optional(),
        issueType: z.nativeEnum(MaintenanceIssueType).default(MaintenanceIssueType.OTHER).openapi({ example: MaintenanceIssueType.PLUMBING }),
        description: z.string().trim().min(1).max(2000).openapi({ example: 'Kitchen sink is leaking' }),
        priority: z.nativeEnum(MaintenancePriority).default(MaintenancePriority.MEDIUM),
    })
    .openapi('CreateMaintenanceRequest');

export const updateMaintenanceRequestSchema = z
    .object({
        tenantId: idSchema.nullable(),
        issueType: z.nativeEnum(MaintenanceIssueType),
        description: z.string().trim().min(1).max(2000),
        priority: z.nativeEnum(MaintenancePriority),
    })
    .partial()
    .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' })
    .openapi('UpdateMaintenanceRequest');

export const maintenanceStatusSchema = z
    .object({
        status: z.nativeEnum(MaintenanceStatus),
    })
    .openapi('MaintenanceStatusChange');

export const maintenanceListQuerySchema = paginationQuerySchema.extend({
    propertyId: idSchema.optional(),
    status: z.nativeEnum(MaintenanceStatus).optional(),
    priority: z.nativeEnum(MaintenancePriority).optional(),
});

export const maintenanceResponseSchema = z
    .object({
        id: z.string(),
        propertyId: z.string(),
        tenantId: z.string().nullable(),
        issueType: z.nativeEnum(MaintenanceIssueType),
        description: z.string(),
        priority: z.nativeEnum(MaintenancePriority),
        status: z.nativeEnum(MaintenanceStatus),
        createdAt: z.string().datetime(),
        resolvedAt: z.string().datetime().nullable(),
    })
    .openapi('MaintenanceRequest');

export type CreateMaintenanceRequestInput = z.infer<typeof createMaintenanceRequestSchema>;
export type UpdateMaintenanceRequestInput = z.infer<typeof updateMaintenanceRequestSchema>;
export type MaintenanceListQuery = z.infer<typeof maintenanceListQuerySchema>;
