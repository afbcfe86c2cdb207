import { Request, Response, NextFunction } from 'express';
import type { AuthContext } from './auth-context';

export interface RequestLogLine {
    level: 'info' | 'warn' | 'error';
    method: string;
    path: string;
    statusCode: number;
    durationMs: number;
    ownerId: AuthContext['ownerId'] | null;
}

function levelFor(statusCode: number): RequestLogLine['level'] {
    if (statusCode >= 500) {
        return 'error';
    }
    return statusCode >= 400 ? 'warn' : 'info';
}

/**
 * One JSON line per finished request. The owner is known once requireAuth has run;
 * query strings are left out since search terms may hold tenant names.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
    const startedAt = Date.now();

    res.on('finish', () => {
        const line: RequestLogLine = {
            level: levelFor(res.statusCode),
            method: req.method,
            path: req.originalUrl.split('?')[0],
            statusCode: res.statusCode,
            durationMs: Date.now() - startedAt,
            ownerId: req.auth?.ownerId ?? null,
        };
        console.log(JSON.stringify(line));
    });

    next();
}
