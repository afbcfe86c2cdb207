import request from 'supertest';
import { faker } from '@faker-js/faker';
import { app } from '../../app';
import { dataSource } from '../../lib/data-source';
import { Owner } from '../../entities/owner.entity';
import { bearer, cleanDatabase, registerOwner, teardownTests } from './setup';

describe('Auth E2E Tests', () => {
    beforeEach(async () => {
        await cleanDatabase();
    });

    afterAll(async () => {
        await teardownTests();
    });

    describe('POST /auth/register', () => {
        it('should create an owner and return a session', async () => {
            const ownerData = {
                username: 'maple_lettings',
                email: 'Landlord@Example.com',
                password: 'test-password',
                phone: '+15550100',
            };

            const response = await request(app)
                .post('/auth/register')
                .send(ownerData)
                .expect(201);

            expect(response.body.success).toBe(true);
            expect(response.body.message).toBe('Registration successful');
            expect(response.body.data).toHaveProperty('accessToken');
            expect(response.body.data).toHaveProperty('refreshToken');
            expect(response.body.data.expiresIn).toBe(900);
            expect(response.body.data.owner.email).toBe('landlord@example.com');
            expect(response.body.data.owner.username).toBe('maple_lettings');
            expect(response.body.data.owner).not.toHaveProperty('passwordHash');

            const owner = await dataSource.getRepository(Owner).findOneBy({ email: 'landlord@example.com' });
            expect(owner).toBeTruthy();
            expect(owner?.passwordHash).not.toBe(ownerData.password);
        });

        it('should reject a duplicate email', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .post('/auth/register')
                .send({ username: 'another_owner', email: owner.email, password: 'test-password' })
                .expect(409);

            expect(response.body.success).toBe(false);
            expect(response.body.error).toBe('Email already registered');
        });

        it('should reject a duplicate username', async () => {
            await request(app)
                .post('/auth/register')
                .send({ username: 'taken_name', email: faker.internet.email(), password: 'test-password' })
                .expect(201);

            const response = await request(app)
                .post('/auth/register')
                .send({ username: 'taken_name', email: 'other@example.com', password: 'test-password' })
                .expect(409);

            expect(response.body.error).toBe('Username already taken');
        });

        it('should fail validation for a short password', async () => {
            const response = await request(app)
                .post('/auth/register')
                .send({ username: 'short_pw', email: 'short@example.com', password: 'abc' })
                .expect(400);

            expect(response.body.success).toBe(false);
            expect(response.body.error).toBe('Validation Error');
            expect(response.body.details[0].path).toEqual(['password']);
        });
        it('should reject a password longer than the hash keeps', async () => {
            const response = await request(app)
                .post('/auth/register')
                .send({ username: 'long_pw', email: 'long@example.com', password: `${'a'.repeat(72)}SECRET` })
                .expect(400);

            expect(response.body.details[0].path).toEqual(['password']);
            expect(response.body.details[0].message).toBe('Password must be at most 72 bytes');
        });

        it('should count multi-byte characters by their encoded length', async () => {
            await request(app)
                .post('/auth/register')
                .send({ username: 'wide_pw', email: 'wide@example.com', password: 'é'.repeat(37) })
                .expect(400);

            await request(app)
                .post('/auth/register')
                .send({ username: 'wide_pw', email: 'wide@example.com', password: 'é'.repeat(36) })
                .expect(201);
        });

        it('should register exactly one owner when the same email races', async () => {
            const email = 'race@example.com';
            const responses = await Promise.all([
                request(app).post('/auth/register').send({ username: 'racer_one', email, password: 'test-password' }),
                request(app).post('/auth/register').send({ username: 'racer_two', email, password: 'test-password' }),
            ]);

            expect(responses.map((r) => r.status).sort()).toEqual([201, 409]);
            const loser = responses.find((r) => r.status === 409);
            expect(loser?.body.error).toBe('Email already registered');
            expect(await dataSource.getRepository(Owner).countBy({ email })).toBe(1);
        });

        it('should register exactly one owner when the same username races', async () => {
            const responses = await Promise.all([
                request(app).post('/auth/register').send({ username: 'same_name', email: 'first@example.com', password: 'test-password' }),
                request(app).post('/auth/register').send({ username: 'same_name', email: 'second@example.com', password: 'test-password' }),
            ]);

            expect(responses.map((r) => r.status).sort()).toEqual([201, 409]);
            expect(responses.find((r) => r.status === 409)?.body.error).toBe('Username already taken');
        });
    });

    describe('POST /auth/login', () => {
        it('should log in with the registered credentials', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .post('/auth/login')
                .send({ email: owner.email, password: owner.password })
                .expect(200);

            expect(response.body.success).toBe(true);
            expect(response.body.data.expiresIn).toBe(900);
            expect(typeof response.body.data.accessToken).toBe('string');
        });

        it('should reject a wrong password', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .post('/auth/login')
                .send({ email: owner.email, password: 'wrong-password' })
                .expect(401);

            expect(response.body.error).toBe('Invalid email or password');
        });

        it('should not accept a password that only shares the first 72 bytes', async () => {
            const password = 'a'.repeat(72);
            await request(app)
                .post('/auth/register')
                .send({ username: 'prefix_pw', email: 'prefix@example.com', password })
                .expect(201);

            const response = await request(app)
                .post('/auth/login')
                .send({ email: 'prefix@example.com', password: `${password}WRONG` })
                .expect(401);

            expect(response.body.error).toBe('Invalid email or password');
        });

        it('should reject an unknown email with the same message', async () => {
            const response = await request(app)
                .post('/auth/login')
                .send({ email: 'nobody@example.com', password: 'test-password' })
                .expect(401);

            expect(response.body.error).toBe('Invalid email or password');
        });
    });

    describe('POST /auth/refresh', () => {
        it('should rotate the refresh token', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .post('/auth/refresh')
                .send({ refreshToken: owner.refreshToken })
                .expect(200);

            expect(response.body.data.refreshToken).not.toBe(owner.refreshToken);

            // The used token is revoked
            await request(app)
                .post('/auth/refresh')
                .send({ refreshToken: owner.refreshToken })
                .expect(401);

            await request(app)
                .post('/auth/refresh')
                .send({ refreshToken: response.body.data.refreshToken })
                .expect(200);
        });

        it('should reject a token that is not a refresh token', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .post('/auth/refresh')
                .send({ refreshToken: owner.accessToken })
                .expect(401);

            expect(response.body.error).toBe('Invalid or expired token');
        });
    });

    describe('POST /auth/logout', () => {
        it('should revoke every refresh token', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .post('/auth/logout')
                .set(bearer(owner))
                .expect(200);

            expect(response.body.data.message).toBe('Logged out');

            await request(app)
                .post('/auth/refresh')
                .send({ refreshToken: owner.refreshToken })
                .expect(401);
        });

        it('should require an access token', async () => {
            await request(app).post('/auth/logout').expect(401);
        });
    });

    describe('GET /auth/me', () => {
        it('should return the owner profile', async () => {
            const owner = await registerOwner();

            const response = await request(app)
                .get('/auth/me')
                .set(bearer(owner))
                .expect(200);

            expect(response.body.data.id).toBe(owner.ownerId);
            expect(response.body.data.email).toBe(owner.email);
            expect(response.body.data).not.toHaveProperty('passwordHash');
        });
    });

    describe('protected routes', () => {
        it('should reject requests without a token', async () => {
            const response = await request(app).get('/properties').expect(401);

            expect(response.body).toEqual({
                success: false,
                message: 'Unauthorized - missing or invalid access token',
                error: 'Unauthorized - missing or invalid access token',
            });
        });

        it('should reject a tampered token', async () => {
            const owner = await registerOwner();

            await request(app)
                .get('/properties')
                .set({ Authorization: `Bearer ${owner.accessToken}x` })
                .expect(401);
        });
    });
});
