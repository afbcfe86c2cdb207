import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import { dashboardService } from '../services/dashboard.service';

export const dashboardRouter: RouterType = Router();

dashboardRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const stats = await dashboardService.getStats(ownerId);
        res.json(successResponse(stats));
    } catch (error) {
        next(error);
    }
});
