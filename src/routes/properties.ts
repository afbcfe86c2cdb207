import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import {
    createPropertySchema,
    propertyListQuerySchema,
    updatePropertySchema,
} from '../validators/property.validator';
import { propertyService } from '../services/property.service';

export const propertyRouter: RouterType = Router();

propertyRouter.post('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = createPropertySchema.parse(req.body);
        const property = await propertyService.createProperty(ownerId, data);
        res.status(201).json(successResponse(property));
    } catch (error) {
        next(error);
    }
});

propertyRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const query = propertyListQuerySchema.parse(req.query);
        const properties = await propertyService.getProperties(ownerId, query);
        res.json(successResponse(properties));
    } catch (error) {
        next(error);
    }
});

propertyRouter.get('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const property = await propertyService.getPropertyById(ownerId, req.params.id);
        res.json(successResponse(property));
    } catch (error) {
        next(error);
    }
});

propertyRouter.put('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = updatePropertySchema.parse(req.body);
        const property = await propertyService.updateProperty(ownerId, req.params.id, data);
        res.json(successResponse(property));
    } catch (error) {
        next(error);
    }
});

propertyRouter.delete('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await propertyService.deleteProperty(ownerId, req.params.id);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
