import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import {
    createPaymentSchema,
    paymentListQuerySchema,
    updatePaymentSchema,
} from '../validators/payment.validator';
import { paymentService } from '../services/payment.service';

export const paymentRouter: RouterType = Router();

paymentRouter.post('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = createPaymentSchema.parse(req.body);
        const payment = await paymentService.createPayment(ownerId, data);
        res.status(201).json(successResponse(payment, 'Payment recorded'));
    } catch (error) {
        next(error);
    }
});

paymentRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const query = paymentListQuerySchema.parse(req.query);
        const payments = await paymentService.getPayments(ownerId, query);
        res.json(successResponse(payments));
    } catch (error) {
        next(error);
    }
});

paymentRouter.get('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const payment = await paymentService.getPaymentById(ownerId, req.params.id);
        res.json(successResponse(payment));
    } catch (error) {
        next(error);
    }
});

paymentRouter.put('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = updatePaymentSchema.parse(req.body);
        const payment = await paymentService.updatePayment(ownerId, req.params.id, data);
        res.json(successResponse(payment));
    } catch (error) {
        next(error);
    }
});

paymentRouter.delete('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await paymentService.deletePayment(ownerId, req.params.id);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
