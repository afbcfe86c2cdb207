import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import {
    createTenantSchema,
    moveOutSchema,
    tenantListQuerySchema,
    updateTenantSchema,
} from '../validators/tenant.validator';
import { tenantService } from '../services/tenant.service';

export const tenantRouter: RouterType = Router();

tenantRouter.post('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = createTenantSchema.parse(req.body);
        const tenant = await tenantService.createTenant(ownerId, data);
        res.status(201).json(successResponse(tenant));
    } catch (error) {
        next(error);
    }
});

tenantRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const query = tenantListQuerySchema.parse(req.query);
        const tenants = await tenantService.getTenants(ownerId, query);
        res.json(successResponse(tenants));
    } catch (error) {
        next(error);
    }
});

tenantRouter.get('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const tenant = await tenantService.getTenantById(ownerId, req.params.id);
        res.json(successResponse(tenant));
    } catch (error) {
        next(error);
    }
});

tenantRouter.put('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = updateTenantSchema.parse(req.body);
        const tenant = await tenantService.updateTenant(ownerId, req.params.id, data);
        res.json(successResponse(tenant));
    } catch (error) {
        next(error);
    }
});

tenantRouter.post('/:id/move-out', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = moveOutSchema.parse(req.body ?? {});
        const tenant = await tenantService.moveOut(ownerId, req.params.id, data);
        res.json(successResponse(tenant));
    } catch (error) {
        next(error);
    }
});

tenantRouter.delete('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await tenantService.deleteTenant(ownerId, req.params.id);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
