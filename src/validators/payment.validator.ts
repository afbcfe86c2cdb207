import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { PaymentMethod, PaymentStatus, PaymentType } from '../types/payment.type';
import {
    dateRangeQuerySchema,
    idSchema,
    isOrderedRange,
    isoDateSchema,
    paginationQuerySchema,
} from './common.validator';

extendZodWithOpenApi(z);

const amountSchema = z.number().finite().positive().openapi({ example: 1200 });

export const createPaymentSchema = z
    .object({
        tenantId: idSchema,
        propertyId: idSchema.optional().openapi({ description: "Defaults to the tenant's property; must match it when given" }),
        amount: amountSchema,
        paymentDate: isoDateSchema.optional().openapi({ description: 'Defaults to today' }),
        paymentMethod: z.nativeEnum(PaymentMethod).default(PaymentMethod.CASH),
        paymentType: z.nativeEnum(PaymentType).default(PaymentType.RENT),
        status: z.nativeEnum(PaymentStatus).default(PaymentStatus.COMPLETED),
        notes: z.string().max(2000).optional(),
    })
    .openapi('CreatePaymentRequest');

export const updatePaymentSchema = z
    .object({
        amount: amountSchema,
        paymentDate: isoDateSchema,
        paymentMethod: z.nativeEnum(PaymentMethod),
        paymentType: z.nativeEnum(PaymentType),
        status: z.nativeEnum(PaymentStatus),
        notes: z.string().max(2000),
    })
    .partial()
    .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' })
    .openapi('UpdatePaymentRequest');

export const paymentListQuerySchema = paginationQuerySchema
    .merge(dateRangeQuerySchema)
    .extend({
        propertyId: idSchema.optional(),
        tenantId: idSchema.optional(),
        paymentType: z.nativeEnum(PaymentType).optional(),
        status: z.nativeEnum(PaymentStatus).optional(),
    })
    .refine(isOrderedRange, { message: 'from must not be after to', path: ['to'] });

export const paymentResponseSchema = z
    .object({
        id: z.string(),
        propertyId: z.string(),
        tenantId: z.string(),
        amount: z.number(),
        paymentDate: z.string(),
        paymentMethod: z.nativeEnum(PaymentMethod),
        paymentType: z.nativeEnum(PaymentType),
        status: z.nativeEnum(PaymentStatus),
        notes: z.string().nullable(),
    })
    .openapi('Payment');

export type CreatePaymentInput = z.infer<typeof createPaymentSchema>;
export type UpdatePaymentInput = z.infer<typeof updatePaymentSchema>;
export type PaymentListQuery = z.infer<typeof paymentListQuerySchema>;
