import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import DateHelper from '../helpers/date.helper';
import { PaginationHelper } from '../helpers/pagination.helper';

extendZodWithOpenApi(z);

export const isoDateSchema = z
    .string()
    .refine((value) => DateHelper.isIsoDate(value), { message: 'Expected a date in YYYY-MM-DD format' })
    .openapi({ example: '2024-05-01', format: 'date' });

export const idSchema = z.string().uuid().openapi({ example: '6f1c2f4e-8f0a-4f8e-9a53-0d6b8d7f1c11' });

export const moneySchema = z.number().finite().nonnegative();

export const paginationQuerySchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(PaginationHelper.MAX_LIMIT).default(PaginationHelper.DEFAULT_LIMIT),
});

export const booleanQuerySchema = z.enum(['true', 'false']).transform((value) => value === 'true');

export const dateRangeQuerySchema = z.object({
    from: isoDateSchema.optional(),
    to: isoDateSchema.optional(),
});

/**
 * ISO dates compare correctly as strings.
 */
export function isOrderedRange(range: { from?: string | null; to?: string | null }): boolean {
    return !range.from || !range.to || range.from <= range.to;
}

export const paginationMetaSchema = z
    .object({
        page: z.number(),
        limit: z.number(),
        total: z.number(),
        totalPages: z.number(),
    })
    .openapi('PaginationMeta');
