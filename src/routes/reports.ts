import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import { financialReportQuerySchema } from '../validators/report.validator';
import { reportService } from '../services/report.service';

export const reportRouter: RouterType = Router();

reportRouter.get('/financial', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const range = financialReportQuerySchema.parse(req.query);
        const report = await reportService.getFinancialReport(ownerId, range);
        res.json(successResponse(report));
    } catch (error) {
        next(error);
    }
});
