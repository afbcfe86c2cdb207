import express, { Request, Response, NextFunction } from 'express';
import request from 'supertest';
import { requestLogger } from './request-logger';

function buildApp(ownerId?: string) {
    const app = express();
    app.use((req: Request, _res: Response, next: NextFunction) => {
        if (ownerId) {
            req.auth = { ownerId };
        }
        next();
    });
    app.use(requestLogger);
    app.get('/properties', (_req, res) => res.json({ ok: true }));
    app.get('/broken', (_req, res) => res.status(500).json({ ok: false }));
    return app;
}

describe('requestLogger', () => {
    let log: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        log.mockRestore();
    });

    function loggedLine() {
        expect(log).toHaveBeenCalledTimes(1);
        return JSON.parse(String(log.mock.calls[0][0]));
    }

    it('should log the owner and path without the query string', async () => {
        await request(buildApp('owner-1')).get('/properties?search=Jane%20Doe').expect(200);

        const line = loggedLine();
        expect(line).toMatchObject({
            level: 'info',
            method: 'GET',
            path: '/properties',
            statusCode: 200,
            ownerId: 'owner-1',
        });
        expect(typeof line.durationMs).toBe('number');
    });

    it('should log a null owner for anonymous requests', async () => {
        await request(buildApp()).get('/missing').expect(404);

        expect(loggedLine()).toMatchObject({ level: 'warn', path: '/missing', statusCode: 404, ownerId: null });
    });

    it('should log server failures at error level', async () => {
        await request(buildApp('owner-2')).get('/broken').expect(500);

        expect(loggedLine()).toMatchObject({ level: 'error', statusCode: 500, ownerId: 'owner-2' });
    });
});
