import { dataSource } from '../lib/data-source';
import { NotFoundError, ValidationError } from '../lib/errors';
import { PaginationHelper } from '../helpers/pagination.helper';
import { Document } from '../entities/document.entity';
import { findOwnedProperty, findOwnedTenant } from './ownership';
import type { CreateDocumentInput, DocumentListQuery } from '../validators/document.validator';

class DocumentService {
    private get documents() {
        return dataSource.getRepository(Document);
    }

    async createDocument(ownerId: string, data: CreateDocumentInput) {
        const property = await findOwnedProperty(ownerId, data.propertyId);

        if (data.tenantId) {
            const tenant = await findOwnedTenant(ownerId, data.tenantId);
            if (tenant.propertyId !== property.id) {
                throw new ValidationError('Tenant does not live in the given property');
            }
        }

        return this.documents.save(
            this.documents.create({
                propertyId: property.id,
                tenantId: data.tenantId ?? null,
                documentType: data.documentType,
                fileName: data.fileName,
                fileUrl: data.fileUrl,
            }),
        );
    }

    async getDocuments(ownerId: string, query: DocumentListQuery) {
        const [items, total] = await this.documents.findAndCount({
            where: {
                property: { ownerId },
                propertyId: query.propertyId,
                tenantId: query.tenantId,
                documentType: query.documentType,
            },
            order: { uploadedAt: 'DESC', fileName: 'ASC' },
            skip: PaginationHelper.getSkip(query.page, query.limit),
            take: PaginationHelper.getLimit(query.limit),
        });

        return PaginationHelper.paginate(items, total, query);
    }

    async getDocumentById(ownerId: string, id: string) {
        return this.findOwned(ownerId, id);
    }

    async deleteDocument(ownerId: string, id: string) {
        const document = await this.findOwned(ownerId, id);
        await this.documents.delete({ id: document.id });
        return { success: true };
    }

    private async findOwned(ownerId: string, id: string) {
        const document = await this.documents.findOneBy({ id, property: { ownerId } });
        if (!document) {
            throw new NotFoundError('Document not found');
        }
        return document;
    }
}

export const documentService = new DocumentService();
