import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';

extendZodWithOpenApi(z);

/** bcrypt ignores everything past this many bytes. */
export const MAX_PASSWORD_BYTES = 72;

export function fitsPasswordHash(password: string): boolean {
    return Buffer.byteLength(password, 'utf8') <= MAX_PASSWORD_BYTES;
}

export const registerSchema = z
    .object({
        username: z
            .string()
            .min(3)
            .max(80)
            .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, dots, dashes and underscores')
            .openapi({ example: 'ada_lettings' }),
        email: z.string().email().max(120).openapi({ example: 'ada@example.com' }),
        password: z
            .string()
            .min(8)
            .refine(fitsPasswordHash, `Password must be at most ${MAX_PASSWORD_BYTES} bytes`)
            .openapi({ example: 'test-password' }),
        phone: z.string().min(3).max(20).optional().openapi({ example: '+15550100' }),
    })
    .openapi('RegisterRequest');

export const loginSchema = z
    .object({
        email: z.string().email(),
        password: z.string().min(1),
    })
    .openapi('LoginRequest');

export const refreshTokenSchema = z
    .object({
        refreshToken: z.string().min(1),
    })
    .openapi('RefreshTokenRequest');

export const sessionSchema = z
    .object({
        accessToken: z.string(),
        refreshToken: z.string(),
        expiresIn: z.number().openapi({ description: 'Access token lifetime in seconds', example: 900 }),
    })
    .openapi('Session');

export const ownerProfileSchema = z
    .object({
        id: z.string(),
        username: z.string(),
        email: z.string(),
        phone: z.string().nullable(),
        createdAt: z.string().datetime(),
    })
    .openapi('OwnerProfile');

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type Session = z.infer<typeof sessionSchema>;
