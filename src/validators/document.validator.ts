import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { DocumentType } from '../types/document.type';
import { idSchema, paginationQuerySchema } from './common.validator';

extendZodWithOpenApi(z);

export const createDocumentSchema = z
    .object({
        propertyId: idSchema,
        tenantId: idSchema.optional(),
        documentType: z.nativeEnum(DocumentType).default(DocumentType.OTHER).openapi({ example: DocumentType.LEASE }),
        fileName: z.string().trim().min(1).max(200).openapi({ example: 'lease-2024.pdf' }),
        fileUrl: z.string().url().max(500).openapi({ example: 'https://files.example.com/lease-2024.pdf' }),
    })
    .openapi('CreateDocumentRequest');

export const documentListQuerySchema = paginationQuerySchema.extend({
    propertyId: idSchema.optional(),
    tenantId: idSchema.optional(),
    documentType: z.nativeEnum(DocumentType).optional(),
});

export const documentResponseSchema = z
    .object({
        id: z.string(),
        propertyId: z.string(),
        tenantId: z.string().nullable(),
        documentType: z.nativeEnum(DocumentType),
        fileName: z.string(),
        fileUrl: z.string(),
        uploadedAt: z.string().datetime(),
    })
    .openapi('Document');

export type CreateDocumentInput = z.infer<typeof createDocumentSchema>;
export type DocumentListQuery = z.infer<typeof documentListQuerySchema>;
