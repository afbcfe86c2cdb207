import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import {
    createMaintenanceRequestSchema,
    maintenanceListQuerySchema,
    maintenanceStatusSchema,
    updateMaintenanceRequestSchema,
} from '../validators/maintenance.validator';
import { maintenanceService } from '../services/maintenance.service';

export const maintenanceRouter: RouterType = Router();

maintenanceRouter.post('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = createMaintenanceRequestSchema.parse(req.body);
        const request = await maintenanceService.createRequest(ownerId, data);
        res.status(201).json(successResponse(request));
    } catch (error) {
        next(error);
    }
});

maintenanceRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const query = maintenanceListQuerySchema.parse(req.query);
        const requests = await maintenanceService.getRequests(ownerId, query);
        res.json(successResponse(requests));
    } catch (error) {
        next(error);
    }
});

maintenanceRouter.get('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const request = await maintenanceService.getRequestById(ownerId, req.params.id);
        res.json(successResponse(request));
    } catch (error) {
        next(error);
    }
});

maintenanceRouter.put('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = updateMaintenanceRequestSchema.parse(req.body);
        const request = await maintenanceService.updateRequest(ownerId, req.params.id, data);
        res.json(successResponse(request));
    } catch (error) {
        next(error);
    }
});

maintenanceRouter.patch('/:id/status', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const { status } = maintenanceStatusSchema.parse(req.body);
        const request = await maintenanceService.changeStatus(ownerId, req.params.id, status);
        res.json(successResponse(request));
    } catch (error) {
        next(error);
    }
});

maintenanceRouter.delete('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await maintenanceService.deleteRequest(ownerId, req.params.id);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
