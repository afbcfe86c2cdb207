import { loadConfig } from './config';

describe('loadConfig', () => {
    it('should use an in-memory database and cheap hashing under test', () => {
        const config = loadConfig({ NODE_ENV: 'test' });

        expect(config.isTest).toBe(true);
        expect(config.database).toEqual({ path: ':memory:', synchronize: true });
        expect(config.bcryptRounds).toBe(4);
        expect(config.requestLogging).toBe(false);
        expect(config.jwt.accessExpiry).toBe('15m');
        expect(config.jwt.refreshExpiry).toBe('7d');
    });

    it('should read overrides from the environment', () => {
        const config = loadConfig({
            NODE_ENV: 'development',
            PORT: '4100',
            DB_PATH: 'data/rentals.db',
            DB_SYNCHRONIZE: 'false',
            JWT_ACCESS_EXPIRY: '1h',
            REQUEST_LOGGING: '0',
        });

        expect(config.port).toBe(4100);
        expect(config.database).toEqual({ path: 'data/rentals.db', synchronize: false });
        expect(config.jwt.accessExpiry).toBe('1h');
        expect(config.requestLogging).toBe(false);
        expect(config.bcryptRounds).toBe(10);
    });

    it('should require signing secrets in production', () => {
        expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(
            'JWT_ACCESS_SECRET and JWT_REFRESH_SECRET must be set in production',
        );
    });

    it('should reject a malformed expiry', () => {
        expect(() => loadConfig({ NODE_ENV: 'test', JWT_ACCESS_EXPIRY: 'soon' })).toThrow();
    });
});
