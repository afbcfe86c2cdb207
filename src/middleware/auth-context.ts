import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { getConfig } from '../lib/config';
import { errorResponse } from '../lib/response';
import { UnauthorizedError } from '../lib/errors';

/**
 * Identity of the owner behind a request, taken from the access token.
 * Every record query is scoped by `ownerId`.
 */
export interface AuthContext {
    ownerId: string;
    email?: string;
}

declare global {
    namespace Express {
        interface Request {
            auth?: AuthContext;
        }
    }
}

/**
 * Verifies the bearer token in the Authorization header.
 *
 * @returns AuthContext or null if the header is missing or the token is invalid/expired
 */
export function extractAuthContext(req: Request): AuthContext | null {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
        return null;
    }

    const token = authHeader.substring(7);
    try {
        const payload = jwt.verify(token, getConfig().jwt.accessSecret);
        if (typeof payload === 'string' || typeof payload.sub !== 'string') {
            return null;
        }
        return {
            ownerId: payload.sub,
            email: typeof payload.email === 'string' ? payload.email : undefined,
        };
    } catch {
        // invalid signature or expired
        return null;
    }
}

/**
 * Middleware that requires an authenticated owner.
 *
 * @example
 * ```typescript
 * app.use('/properties', requireAuth, propertyRouter);
 * ```
 */
export function requireAuth(req: Request, res: Response, next: NextFunction) {
    const auth = extractAuthContext(req);
    if (!auth) {
        return res.status(401).json(errorResponse('Unauthorized - missing or invalid access token'));
    }

    req.auth = auth;
    next();
}

/**
 * Auth context attached by requireAuth. Throws when the route is not protected.
 */
export function getAuthContext(req: Request): AuthContext {
    if (!req.auth) {
        throw new UnauthorizedError('Auth context not found');
    }
    return req.auth;
}
