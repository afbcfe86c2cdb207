import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import { createDocumentSchema, documentListQuerySchema } from '../validators/document.validator';
import { documentService } from '../services/document.service';

export const documentRouter: RouterType = Router();

documentRouter.post('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = createDocumentSchema.parse(req.body);
        const document = await documentService.createDocument(ownerId, data);
        res.status(201).json(successResponse(document));
    } catch (error) {
        next(error);
    }
});

documentRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const query = documentListQuerySchema.parse(req.query);
        const documents = await documentService.getDocuments(ownerId, query);
        res.json(successResponse(documents));
    } catch (error) {
        next(error);
    }
});

documentRouter.get('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const document = await documentService.getDocumentById(ownerId, req.params.id);
        res.json(successResponse(document));
    } catch (error) {
        next(error);
    }
});

documentRouter.delete('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await documentService.deleteDocument(ownerId, req.params.id);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
