import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { LessThan, QueryFailedError } from 'typeorm';
import { dataSource } from '../lib/data-source';
import { getConfig } from '../lib/config';
import { ConflictError, UnauthorizedError } from '../lib/errors';
import DateHelper from '../helpers/date.helper';
import { Owner } from '../entities/owner.entity';
import { RefreshToken } from '../entities/refresh-token.entity';
import { fitsPasswordHash, LoginInput, RegisterInput, Session } from '../validators/auth.validator';

export interface OwnerProfile {
    id: string;
    username: string;
    email: string;
    phone: string | null;
    createdAt: Date;
}

export function toOwnerProfile(owner: Owner): OwnerProfile {
    return {
        id: owner.id,
        username: owner.username,
        email: owner.email,
        phone: owner.phone,
        createdAt: owner.createdAt,
    };
}

/**
 * A registration racing another one for the same email or username loses at the unique index.
 */
function toRegistrationConflict(error: unknown): unknown {
    if (!(error instanceof QueryFailedError) || !error.message.includes('UNIQUE constraint failed')) {
        return error;
    }
    return error.message.includes('owner.username')
        ? new ConflictError('Username already taken')
        : new ConflictError('Email already registered');
}

class AuthService {
    private get owners() {
        return dataSource.getRepository(Owner);
    }

    private get refreshTokens() {
        return dataSource.getRepository(RefreshToken);
    }

    async register(data: RegisterInput): Promise<{ owner: OwnerProfile } & Session> {
        const email = data.email.toLowerCase();

        if (await this.owners.existsBy({ email })) {
            throw new ConflictError('Email already registered');
        }

        if (await this.owners.existsBy({ username: data.username })) {
            throw new ConflictError('Username already taken');
        }

        const passwordHash = await bcrypt.hash(data.password, getConfig().bcryptRounds);
        const owner = await this.owners
            .save(
                this.owners.create({
                    username: data.username,
                    email,
                    passwordHash,
                    phone: data.phone ?? null,
                }),
            )
            .catch((error: unknown) => {
                throw toRegistrationConflict(error);
            });

        const session = await this.generateSession(owner);
        return { owner: toOwnerProfile(owner), ...session };
    }

    async login(data: LoginInput): Promise<Session> {
        const owner = await this.owners.findOneBy({ email: data.email.toLowerCase() });

        // Same message for unknown email and wrong password. Over-long passwords would compare on a truncated prefix
        if (!owner || !fitsPasswordHash(data.password) || !(await bcrypt.compare(data.password, owner.passwordHash))) {
            throw new UnauthorizedError('Invalid email or password');
        }

        return this.generateSession(owner);
    }

    /**
     * Exchanges a refresh token for a new session. The presented token is revoked.
     */
    async refresh(token: string): Promise<Session> {
        let jti: string;
        try {
            const payload = jwt.verify(token, getConfig().jwt.refreshSecret);
            if (typeof payload === 'string' || typeof payload.jti !== 'string') {
                throw new UnauthorizedError('Invalid or expired token');
            }
            jti = payload.jti;
        } catch {
            throw new UnauthorizedError('Invalid or expired token');
        }

        const stored = await this.refreshTokens.findOne({
            where: { jti },
            relations: { owner: true },
        });

        if (!stored || stored.expiresAt < new Date()) {
            throw new UnauthorizedError('Invalid or expired token');
        }

        await this.refreshTokens.delete({ jti });
        return this.generateSession(stored.owner);
    }

    async logout(ownerId: string) {
        await this.refreshTokens.delete({ ownerId });
        return { message: 'Logged out' };
    }

    async getProfile(ownerId: string): Promise<OwnerProfile> {
        const owner = await this.owners.findOneBy({ id: ownerId });
        if (!owner) {
            throw new UnauthorizedError('Owner not found');
        }
        return toOwnerProfile(owner);
    }

    private async generateSession(owner: Owner): Promise<Session> {
        const { jwt: jwtConfig } = getConfig();
        const accessExpiryMs = DateHelper.parseDurationToMs(jwtConfig.accessExpiry);
        const refreshExpiryMs = DateHelper.parseDurationToMs(jwtConfig.refreshExpiry);

        // Unique jti so two sessions issued in the same second differ
        const refreshJti = randomUUID();

        const accessToken = jwt.sign({ email: owner.email, jti: randomUUID() }, jwtConfig.accessSecret, {
            subject: owner.id,
            expiresIn: Math.floor(accessExpiryMs / 1000),
        });
        const refreshToken = jwt.sign({ jti: refreshJti }, jwtConfig.refreshSecret, {
            subject: owner.id,
            expiresIn: Math.floor(refreshExpiryMs / 1000),
        });

        await this.refreshTokens.delete({ ownerId: owner.id, expiresAt: LessThan(new Date()) });
        await this.refreshTokens.save(
            this.refreshTokens.create({
                jti: refreshJti,
                ownerId: owner.id,
                expiresAt: new Date(Date.now() + refreshExpiryMs),
            }),
        );

        return {
            accessToken,
            refreshToken,
            expiresIn: Math.floor(accessExpiryMs / 1000),
        };
    }
}

export const authService = new AuthService();
