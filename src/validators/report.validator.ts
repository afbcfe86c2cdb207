import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { dateRangeQuerySchema, isOrderedRange } from './common.validator';

extendZodWithOpenApi(z);

export const financialReportQuerySchema = dateRangeQuerySchema.refine(isOrderedRange, {
    message: 'from must not be after to',
    path: ['to'],
});

const propertyRowSchema = z.object({
    propertyId: z.string(),
    propertyName: z.string(),
    income: z.number(),
    expenses: z.number(),
    net: z.number(),
});

export const financialReportSchema = z
    .object({
        from: z.string().nullable(),
        to: z.string().nullable(),
        properties: z.array(propertyRowSchema),
        incomeByType: z.record(z.number()),
        expensesByCategory: z.record(z.number()),
        totals: z.object({
            income: z.number(),
            expenses: z.number(),
            net: z.number(),
        }),
    })
    .openapi('FinancialReport');

export type FinancialReportQuery = z.infer<typeof financialReportQuerySchema>;
export type FinancialReport = z.infer<typeof financialReportSchema>;
export type PropertyReportRow = z.infer<typeof propertyRowSchema>;
