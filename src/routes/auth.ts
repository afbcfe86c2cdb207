import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { requireAuth, getAuthContext } from '../middleware/auth-context';
import { loginSchema, refreshTokenSchema, registerSchema } from '../validators/auth.validator';
import { authService } from '../services/auth.service';

export const authRouter: RouterType = Router();

authRouter.post('/register', async (req, res, next) => {
    try {
        const data = registerSchema.parse(req.body);
        const result = await authService.register(data);
        res.status(201).json(successResponse(result, 'Registration successful'));
    } catch (error) {
        next(error);
    }
});

authRouter.post('/login', async (req, res, next) => {
    try {
        const data = loginSchema.parse(req.body);
        const result = await authService.login(data);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});

authRouter.post('/refresh', async (req, res, next) => {
    try {
        const { refreshToken } = refreshTokenSchema.parse(req.body);
        const result = await authService.refresh(refreshToken);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});

authRouter.post('/logout', requireAuth, async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await authService.logout(ownerId);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});

authRouter.get('/me', requireAuth, async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const result = await authService.getProfile(ownerId);
        res.json(successResponse(result));
    } catch (error) {
        next(error);
    }
});
