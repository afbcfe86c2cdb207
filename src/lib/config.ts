import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

const expiry = z.string().regex(/^\d+[smhd]$/, 'Expected a duration such as 15m or 7d');

const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DB_PATH: z.string().optional(),
    DB_SYNCHRONIZE: booleanFlag.optional(),
    JWT_ACCESS_SECRET: z.string().min(1).optional(),
    JWT_REFRESH_SECRET: z.string().min(1).optional(),
    JWT_ACCESS_EXPIRY: expiry.default('15m'),
    JWT_REFRESH_EXPIRY: expiry.default('7d'),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).optional(),
    REQUEST_LOGGING: booleanFlag.optional(),
});

export interface AppConfig {
    env: string;
    isTest: boolean;
    port: number;
    database: {
        path: string;
        synchronize: boolean;
    };
    jwt: {
        accessSecret: string;
        refreshSecret: string;
        accessExpiry: string;
        refreshExpiry: string;
    };
    bcryptRounds: number;
    requestLogging: boolean;
}

let cached: AppConfig | null = null;

/**
 * Builds the service configuration from environment variables.
 * Secrets fall back to local placeholders everywhere except production.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);
    const isTest = parsed.NODE_ENV === 'test';
    const isProduction = parsed.NODE_ENV === 'production';

    if (isProduction && (!parsed.JWT_ACCESS_SECRET || !parsed.JWT_REFRESH_SECRET)) {
        throw new Error('JWT_ACCESS_SECRET and JWT_REFRESH_SECRET must be set in production');
    }

    return {
        env: parsed.NODE_ENV,
        isTest,
        port: parsed.PORT,
        database: {
            path: parsed.DB_PATH ?? (isTest ? ':memory:' : 'rental_management.db'),
            synchronize: parsed.DB_SYNCHRONIZE ?? !isProduction,
        },
        jwt: {
            accessSecret: parsed.JWT_ACCESS_SECRET ?? 'local-access-secret',
            refreshSecret: parsed.JWT_REFRESH_SECRET ?? 'local-refresh-secret',
            accessExpiry: parsed.JWT_ACCESS_EXPIRY,
            refreshExpiry: parsed.JWT_REFRESH_EXPIRY,
        },
        bcryptRounds: parsed.BCRYPT_ROUNDS ?? (isTest ? 4 : 10),
        requestLogging: parsed.REQUEST_LOGGING ?? !isTest,
    };
}

export function getConfig(): AppConfig {
    if (!cached) {
        cached = loadConfig();
    }
    return cached;
}
