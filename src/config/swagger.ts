import { OpenAPIRegistry, OpenApiGeneratorV3, RouteConfig } from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import {
    loginSchema,
    ownerProfileSchema,
    refreshTokenSchema,
    registerSchema,
    sessionSchema,
} from '../validators/auth.validator';
import { paginationMetaSchema } from '../validators/common.validator';
import {
    createPropertySchema,
    propertyListQuerySchema,
    propertyResponseSchema,
    propertySummarySchema,
    updatePropertySchema,
} from '../validators/property.validator';
import {
    createTenantSchema,
    moveOutSchema,
    tenantListQuerySchema,
    tenantResponseSchema,
    updateTenantSchema,
} from '../validators/tenant.validator';
import { createPaymentSchema, paymentResponseSchema, updatePaymentSchema } from '../validators/payment.validator';
import { createExpenseSchema, expenseResponseSchema, updateExpenseSchema } from '../validators/expense.validator';
import {
    createMaintenanceRequestSchema,
    maintenanceListQuerySchema,
    maintenanceResponseSchema,
    maintenanceStatusSchema,
    updateMaintenanceRequestSchema,
} from '../validators/maintenance.validator';
import {
    createDocumentSchema,
    documentListQuerySchema,
    documentResponseSchema,
} from '../validators/document.validator';
import { dashboardSchema } from '../validators/dashboard.validator';
import { financialReportSchema } from '../validators/report.validator';
import { reminderResponseSchema, sendReminderSchema } from '../validators/reminder.validator';

extendZodWithOpenApi(z);

export const registry = new OpenAPIRegistry();

registry.registerComponent('securitySchemes', 'bearerAuth', {
    type: 'http',
    scheme: 'bearer',
    bearerFormat: 'JWT',
});

const apiErrorSchema = registry.register(
    'ApiError',
    z
        .object({
            success: z.literal(false),
            message: z.string(),
            error: z.string(),
            details: z.array(z.unknown()).optional(),
        })
        .openapi('ApiError'),
);

const idParams = z.object({ id: z.string().uuid() });

function success(description: string, data: z.ZodTypeAny) {
    return {
        description,
        content: {
            'application/json': {
                schema: z.object({ success: z.literal(true), data }),
            },
        },
    };
}

function failure(description: string) {
    return {
        description,
        content: { 'application/json': { schema: apiErrorSchema } },
    };
}

function page(item: z.ZodTypeAny) {
    return z.object({ items: z.array(item), pagination: paginationMetaSchema });
}

function jsonBody(schema: z.ZodTypeAny) {
    return { content: { 'application/json': { schema } } };
}

const deletedSchema = z.object({ success: z.literal(true) });

function registerProtected(route: RouteConfig) {
    registry.registerPath({
        ...route,
        security: [{ bearerAuth: [] }],
        responses: {
            ...route.responses,
            401: failure('Missing or invalid access token'),
        },
    });
}

// Health
registry.registerPath({
    method: 'get',
    path: '/health',
    tags: ['Health'],
    summary: 'Liveness check',
    responses: {
        200: {
            description: 'Service is up',
            content: {
                'application/json': {
                    schema: z.object({ status: z.string(), service: z.string() }),
                },
            },
        },
    },
});

// Auth
registry.registerPath({
    method: 'post',
    path: '/auth/register',
    tags: ['Auth'],
    summary: 'Register a new owner account',
    request: { body: jsonBody(registerSchema) },
    responses: {
        201: success('Owner registered', sessionSchema.extend({ owner: ownerProfileSchema })),
        400: failure('Validation error'),
        409: failure('Email or username already in use'),
    },
});

registry.registerPath({
    method: 'post',
    path: '/auth/login',
    tags: ['Auth'],
    summary: 'Log in with email and password',
    request: { body: jsonBody(loginSchema) },
    responses: {
        200: success('Session issued', sessionSchema),
        401: failure('Invalid email or password'),
    },
});

registry.registerPath({
    method: 'post',
    path: '/auth/refresh',
    tags: ['Auth'],
    summary: 'Rotate the refresh token',
    request: { body: jsonBody(refreshTokenSchema) },
    responses: {
        200: success('Session issued', sessionSchema),
        401: failure('Invalid or expired token'),
    },
});

registerProtected({
    method: 'post',
    path: '/auth/logout',
    tags: ['Auth'],
    summary: 'Revoke every refresh token of the owner',
    responses: { 200: success('Logged out', z.object({ message: z.string() })) },
});

registerProtected({
    method: 'get',
    path: '/auth/me',
    tags: ['Auth'],
    summary: 'Current owner profile',
    responses: { 200: success('Owner profile', ownerProfileSchema) },
});

// Dashboard
registerProtected({
    method: 'get',
    path: '/dashboard',
    tags: ['Dashboard'],
    summary: 'Portfolio statistics',
    responses: { 200: success('Dashboard statistics', dashboardSchema) },
});

// Properties
registerProtected({
    method: 'post',
    path: '/properties',
    tags: ['Properties'],
    summary: 'Create a property',
    request: { body: jsonBody(createPropertySchema) },
    responses: {
        201: success('Property created', propertyResponseSchema),
        400: failure('Validation error'),
    },
});

registerProtected({
    method: 'get',
    path: '/properties',
    tags: ['Properties'],
    summary: 'List properties',
    request: { query: propertyListQuerySchema },
    responses: { 200: success('Page of properties', page(propertyResponseSchema)) },
});

registerProtected({
    method: 'get',
    path: '/properties/{id}',
    tags: ['Properties'],
    summary: 'Get a property with its summary',
    request: { params: idParams },
    responses: {
        200: success('Property', propertyResponseSchema.extend({ summary: propertySummarySchema })),
        404: failure('Property not found'),
    },
});

registerProtected({
    method: 'put',
    path: '/properties/{id}',
    tags: ['Properties'],
    summary: 'Update a property',
    request: { params: idParams, body: jsonBody(updatePropertySchema) },
    responses: {
        200: success('Property updated', propertyResponseSchema),
        404: failure('Property not found'),
    },
});

registerProtected({
    method: 'delete',
    path: '/properties/{id}',
    tags: ['Properties'],
    summary: 'Delete a property and every record under it',
    request: { params: idParams },
    responses: {
        200: success('Property deleted', deletedSchema),
        404: failure('Property not found'),
    },
});

// Tenants
registerProtected({
    method: 'post',
    path: '/tenants',
    tags: ['Tenants'],
    summary: 'Add a tenant to a property',
    request: { body: jsonBody(createTenantSchema) },
    responses: {
        201: success('Tenant created', tenantResponseSchema),
        400: failure('Validation error'),
        404: failure('Property not found'),
    },
});

registerProtected({
    method: 'get',
    path: '/tenants',
    tags: ['Tenants'],
    summary: 'List tenants',
    request: { query: tenantListQuerySchema },
    responses: { 200: success('Page of tenants', page(tenantResponseSchema)) },
});

registerProtected({
    method: 'get',
    path: '/tenants/{id}',
    tags: ['Tenants'],
    summary: 'Get a tenant with their payment total',
    request: { params: idParams },
    responses: {
        200: success('Tenant', tenantResponseSchema.extend({ effectiveMonthlyRent: z.number(), totalPaid: z.number() })),
        404: failure('Tenant not found'),
    },
});

registerProtected({
    method: 'put',
    path: '/tenants/{id}',
    tags: ['Tenants'],
    summary: 'Update a tenant',
    request: { params: idParams, body: jsonBody(updateTenantSchema) },
    responses: {
        200: success('Tenant updated', tenantResponseSchema),
        404: failure('Tenant not found'),
        409: failure('Tenant has payments in another property'),
    },
});

registerProtected({
    method: 'post',
    path: '/tenants/{id}/move-out',
    tags: ['Tenants'],
    summary: 'Mark a tenant as moved out',
    request: { params: idParams, body: jsonBody(moveOutSchema) },
    responses: {
        200: success('Tenant moved out', tenantResponseSchema),
        404: failure('Tenant not found'),
    },
});

registerProtected({
    method: 'delete',
    path: '/tenants/{id}',
    tags: ['Tenants'],
    summary: 'Delete a tenant and their payments',
    request: { params: idParams },
    responses: {
        200: success('Tenant deleted', deletedSchema),
        404: failure('Tenant not found'),
    },
});

// Payments
registerProtected({
    method: 'post',
    path: '/payments',
    tags: ['Payments'],
    summary: 'Record a payment',
    request: { body: jsonBody(createPaymentSchema) },
    responses: {
        201: success('Payment recorded', paymentResponseSchema),
        400: failure('Validation error'),
        404: failure('Tenant not found'),
    },
});

registerProtected({
    method: 'get',
    path: '/payments',
    tags: ['Payments'],
    summary: 'List payments, newest first',
    responses: { 200: success('Page of payments', page(paymentResponseSchema)) },
});

registerProtected({
    method: 'get',
    path: '/payments/{id}',
    tags: ['Payments'],
    summary: 'Get a payment',
    request: { params: idParams },
    responses: {
        200: success('Payment', paymentResponseSchema),
        404: failure('Payment not found'),
    },
});

registerProtected({
    method: 'put',
    path: '/payments/{id}',
    tags: ['Payments'],
    summary: 'Update a payment',
    request: { params: idParams, body: jsonBody(updatePaymentSchema) },
    responses: {
        200: success('Payment updated', paymentResponseSchema),
        404: failure('Payment not found'),
    },
});

registerProtected({
    method: 'delete',
    path: '/payments/{id}',
    tags: ['Payments'],
    summary: 'Delete a payment',
    request: { params: idParams },
    responses: {
        200: success('Payment deleted', deletedSchema),
        404: failure('Payment not found'),
    },
});

// Expenses
registerProtected({
    method: 'post',
    path: '/expenses',
    tags: ['Expenses'],
    summary: 'Record an expense',
    request: { body: jsonBody(createExpenseSchema) },
    responses: {
        201: success('Expense recorded', expenseResponseSchema),
        400: failure('Validation error'),
        404: failure('Property not found'),
    },
});

registerProtected({
    method: 'get',
    path: '/expenses',
    tags: ['Expenses'],
    summary: 'List expenses, newest first',
    responses: { 200: success('Page of expenses', page(expenseResponseSchema)) },
});

registerProtected({
    method: 'get',
    path: '/expenses/{id}',
    tags: ['Expenses'],
    summary: 'Get an expense',
    request: { params: idParams },
    responses: {
        200: success('Expense', expenseResponseSchema),
        404: failure('Expense not found'),
    },
});

registerProtected({
    method: 'put',
    path: '/expenses/{id}',
    tags: ['Expenses'],
    summary: 'Update an expense',
    request: { params: idParams, body: jsonBody(updateExpenseSchema) },
    responses: {
        200: success('Expense updated', expenseResponseSchema),
        404: failure('Expense not found'),
    },
});

registerProtected({
    method: 'delete',
    path: '/expenses/{id}',
    tags: ['Expenses'],
    summary: 'Delete an expense',
    request: { params: idParams },
    responses: {
        200: success('Expense deleted', deletedSchema),
        404: failure('Expense not found'),
    },
});

// Maintenance
registerProtected({
    method: 'post',
    path: '/maintenance-requests',
    tags: ['Maintenance'],
    summary: 'Open a maintenance request',
    request: { body: jsonBody(createMaintenanceRequestSchema) },
    responses: {
        201: success('Request opened', maintenanceResponseSchema),
        400: failure('Validation error'),
        404: failure('Property or tenant not found'),
    },
});

registerProtected({
    method: 'get',
    path: '/maintenance-requests',
    tags: ['Maintenance'],
    summary: 'List maintenance requests, newest first',
    request: { query: maintenanceListQuerySchema },
    responses: { 200: success('Page of requests', page(maintenanceResponseSchema)) },
});

registerProtected({
    method: 'get',
    path: '/maintenance-requests/{id}',
    tags: ['Maintenance'],
    summary: 'Get a maintenance request',
    request: { params: idParams },
    responses: {
        200: success('Maintenance request', maintenanceResponseSchema),
        404: failure('Maintenance request not found'),
    },
});

registerProtected({
    method: 'put',
    path: '/maintenance-requests/{id}',
    tags: ['Maintenance'],
    summary: 'Update a maintenance request',
    request: { params: idParams, body: jsonBody(updateMaintenanceRequestSchema) },
    responses: {
        200: success('Request updated', maintenanceResponseSchema),
        404: failure('Maintenance request not found'),
    },
});

registerProtected({
    method: 'patch',
    path: '/maintenance-requests/{id}/status',
    tags: ['Maintenance'],
    summary: 'Move a request through open, in_progress and completed',
    request: { params: idParams, body: jsonBody(maintenanceStatusSchema) },
    responses: {
        200: success('Status changed', maintenanceResponseSchema),
        404: failure('Maintenance request not found'),
        409: failure('Transition not allowed'),
    },
});

registerProtected({
    method: 'delete',
    path: '/maintenance-requests/{id}',
    tags: ['Maintenance'],
    summary: 'Delete a maintenance request',
    request: { params: idParams },
    responses: {
        200: success('Request deleted', deletedSchema),
        404: failure('Maintenance request not found'),
    },
});

// Documents
registerProtected({
    method: 'post',
    path: '/documents',
    tags: ['Documents'],
    summary: 'Attach a document to a property',
    request: { body: jsonBody(createDocumentSchema) },
    responses: {
        201: success('Document attached', documentResponseSchema),
        400: failure('Validation error'),
        404: failure('Property or tenant not found'),
    },
});

registerProtected({
    method: 'get',
    path: '/documents',
    tags: ['Documents'],
    summary: 'List documents',
    request: { query: documentListQuerySchema },
    responses: { 200: success('Page of documents', page(documentResponseSchema)) },
});

registerProtected({
    method: 'get',
    path: '/documents/{id}',
    tags: ['Documents'],
    summary: 'Get a document',
    request: { params: idParams },
    responses: {
        200: success('Document', documentResponseSchema),
        404: failure('Document not found'),
    },
});

registerProtected({
    method: 'delete',
    path: '/documents/{id}',
    tags: ['Documents'],
    summary: 'Delete a document',
    request: { params: idParams },
    responses: {
        200: success('Document deleted', deletedSchema),
        404: failure('Document not found'),
    },
});

// Reports
registerProtected({
    method: 'get',
    path: '/reports/financial',
    tags: ['Reports'],
    summary: 'Income and expenses per property over an inclusive date range',
    responses: {
        200: success('Financial report', financialReportSchema),
        400: failure('Invalid date range'),
    },
});

// Reminders
registerProtected({
    method: 'post',
    path: '/reminders/whatsapp',
    tags: ['Reminders'],
    summary: 'Send a rent reminder to a tenant',
    request: { body: jsonBody(sendReminderSchema) },
    responses: {
        200: success('Reminder sent', reminderResponseSchema),
        400: failure('Tenant has moved out'),
        404: failure('Tenant not found'),
    },
});

export function generateOpenAPIDocument() {
    const generator = new OpenApiGeneratorV3(registry.definitions);

    return generator.generateDocument({
        openapi: '3.0.0',
        info: {
            version: '1.0.0',
            title: 'Rental Manager API',
            description: 'Properties, tenants, payments, expenses and maintenance for small landlords',
        },
        servers: [
            {
                url: 'http://localhost:3000',
                description: 'Local development server',
            },
        ],
        tags: [
            { name: 'Auth', description: 'Owner accounts and sessions' },
            { name: 'Dashboard', description: 'Portfolio statistics' },
            { name: 'Properties', description: 'Property records' },
            { name: 'Tenants', description: 'Tenant records' },
            { name: 'Payments', description: 'Rent and other payments' },
            { name: 'Expenses', description: 'Property expenses' },
            { name: 'Maintenance', description: 'Maintenance requests' },
            { name: 'Documents', description: 'Document metadata' },
            { name: 'Reports', description: 'Financial reports' },
            { name: 'Reminders', description: 'Rent reminders' },
            { name: 'Health', description: 'Health check endpoints' },
        ],
    });
}
