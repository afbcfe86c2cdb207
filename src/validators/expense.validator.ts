import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { ExpenseCategory } from '../types/expense.type';
import {
    dateRangeQuerySchema,
    idSchema,
    isOrderedRange,
    isoDateSchema,
    paginationQuerySchema,
} from './common.validator';

extendZodWithOpenApi(z);

const expenseFields = z.object({
    propertyId: idSchema,
    category: z.nativeEnum(ExpenseCategory).default(ExpenseCategory.OTHER).openapi({ example: ExpenseCategory.UTILITIES }),
    description: z.string().max(2000).optional().openapi({ example: 'Quarterly water bill' }),
    amount: z.number().finite().positive().openapi({ example: 180.5 }),
    expenseDate: isoDateSchema.optional().openapi({ description: 'Defaults to today' }),
    vendor: z.string().max(200).optional().openapi({ example: 'City Water' }),
    receiptUrl: z.string().url().max(500).optional(),
});

export const createExpenseSchema = expenseFields.openapi('CreateExpenseRequest');

export const updateExpenseSchema = expenseFields
    .partial()
    .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' })
    .openapi('UpdateExpenseRequest');

export const expenseListQuerySchema = paginationQuerySchema
    .merge(dateRangeQuerySchema)
    .extend({
        propertyId: idSchema.optional(),
        category: z.nativeEnum(ExpenseCategory).optional(),
    })
    .refine(isOrderedRange, { message: 'from must not be after to', path: ['to'] });

export const expenseResponseSchema = z
    .object({
        id: z.string(),
        propertyId: z.string(),
        category: z.nativeEnum(ExpenseCategory),
        description: z.string().nullable(),
        amount: z.number(),
        expenseDate: z.string(),
        vendor: z.string().nullable(),
        receiptUrl: z.string().nullable(),
    })
    .openapi('Expense');

export type CreateExpenseInput = z.infer<typeof createExpenseSchema>;
export type UpdateExpenseInput = z.infer<typeof updateExpenseSchema>;
export type ExpenseListQuery = z.infer<typeof expenseListQuerySchema>;
