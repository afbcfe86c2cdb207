import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import {
    createExpenseSchema,
    expenseListQuerySchema,
    updateExpenseSchema,
} from '../validators/expense.validator';
import { expenseService } from '../services/expense.service';

export const expenseRouter: RouterType = Router();

expenseRouter.post('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = createExpenseSchema.parse(req.body);
        const expense = await expenseService.createExpense(ownerId, data);
        res.status(201).json(successResponse(expense));
    } catch (error) {
        next(error);
    }
});

expenseRouter.get('/', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const query = expenseListQuerySchema.parse(req.query);
        const expenses = await expenseService.getExpenses(ownerId, query);
        res.json(successResponse(expenses));
    } catch (error) {
        next(error);
    }
});

expenseRouter.get('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const expense = await expenseService.getExpenseById(ownerId, req.params.id);
        res.json(successResponse(expense));
    } catch (error) {
        next(error);
    }
});

expenseRouter.put('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = updateExpenseSchema.parse(req.body);
        const expense = await expenseService.updateExpense(ownerId, req.params.id, data);
        res.json(successResponse(expense));
    } catch (error) {
        next(error);
    }
});

expenseRouter.delete('/:id', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await expenseService.deleteExpense(ownerId, req.params.id);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
