import request from 'supertest';
import { app } from '../../app';
import DateHelper from '../../helpers/date.helper';
import {
    bearer,
    cleanDatabase,
    createProperty,
    createTenant,
    recordPayment,
    registerOwner,
    teardownTests,
    TestOwner,
} from './setup';

describe('Payment E2E Tests', () => {
    let owner: TestOwner;
    let propertyId: string;
    let tenantId: string;

    beforeEach(async () => {
        await cleanDatabase();
        owner = await registerOwner();
        propertyId = await createProperty(owner, { monthlyRent: 1000 });
        tenantId = await createTenant(owner, propertyId);
    });

    afterAll(async () => {
        await teardownTests();
    });

    async function totals() {
        const tenant = await request(app).get(`/tenants/${tenantId}`).set(bearer(owner)).expect(200);
        const property = await request(app).get(`/properties/${propertyId}`).set(bearer(owner)).expect(200);
        return {
            tenant: tenant.body.data.totalPaid,
            property: property.body.data.summary.totalPayments,
        };
    }

    describe('POST /payments', () => {
        it('should record a payment with defaults from the tenant', async () => {
            const response = await request(app)
                .post('/payments')
                .set(bearer(owner))
                .send({ tenantId, amount: 1000 })
                .expect(201);

            expect(response.body.message).toBe('Payment recorded');
            expect(response.body.data).toMatchObject({
                tenantId,
                propertyId,
                amount: 1000,
                paymentDate: DateHelper.today(),
                paymentMethod: 'cash',
                paymentType: 'rent',
                status: 'completed',
                notes: null,
            });
        });

        it('should increase tenant and property totals by exactly the amount', async () => {
            expect(await totals()).toEqual({ tenant: 0, property: 0 });

            await recordPayment(owner, tenantId, { amount: 845.5 });
            expect(await totals()).toEqual({ tenant: 845.5, property: 845.5 });

            await recordPayment(owner, tenantId, { amount: 154.5 });
            expect(await totals()).toEqual({ tenant: 1000, property: 1000 });
        });

        it('should not count pending payments', async () => {
            await recordPayment(owner, tenantId, { amount: 600, status: 'pending' });

            expect(await totals()).toEqual({ tenant: 0, property: 0 });
        });

        it("should reject a property that is not the tenant's", async () => {
            const otherPropertyId = await createProperty(owner);

            const response = await request(app)
                .post('/payments')
                .set(bearer(owner))
                .send({ tenantId, propertyId: otherPropertyId, amount: 10 })
                .expect(400);

            expect(response.body.error).toBe('Tenant does not live in the given property');
        });

        it('should reject a zero amount', async () => {
            await request(app)
                .post('/payments')
                .set(bearer(owner))
                .send({ tenantId, amount: 0 })
                .expect(400);
        });
    });

    describe('GET /payments', () => {
        beforeEach(async () => {
            await recordPayment(owner, tenantId, { amount: 100, paymentDate: '2024-01-05' });
            await recordPayment(owner, tenantId, { amount: 200, paymentDate: '2024-03-05', paymentType: 'maintenance' });
            await recordPayment(owner, tenantId, { amount: 300, paymentDate: '2024-02-05' });
        });

        it('should list newest payment date first', async () => {
            const response = await request(app).get('/payments').set(bearer(owner)).expect(200);

            expect(response.body.data.items.map((p: { paymentDate: string }) => p.paymentDate)).toEqual([
                '2024-03-05',
                '2024-02-05',
                '2024-01-05',
            ]);
        });

        it('should filter by an inclusive date range', async () => {
            const response = await request(app)
                .get('/payments?from=2024-01-05&to=2024-02-05')
                .set(bearer(owner))
                .expect(200);

            expect(response.body.data.items.map((p: { amount: number }) => p.amount)).toEqual([300, 100]);
        });

        it('should filter by payment type', async () => {
            const response = await request(app)
                .get('/payments?paymentType=maintenance')
                .set(bearer(owner))
                .expect(200);

            expect(response.body.data.pagination.total).toBe(1);
            expect(response.body.data.items[0].amount).toBe(200);
        });

        it('should reject a reversed range', async () => {
            await request(app)
                .get('/payments?from=2024-03-01&to=2024-01-01')
                .set(bearer(owner))
                .expect(400);
        });
    });

    describe('GET /payments/:id', () => {
        it('should include the tenant', async () => {
            const paymentId = await recordPayment(owner, tenantId);

            const response = await request(app).get(`/payments/${paymentId}`).set(bearer(owner)).expect(200);

            expect(response.body.data.tenant.id).toBe(tenantId);
        });
    });

    describe('PUT /payments/:id', () => {
        it('should update the amount and status', async () => {
            const paymentId = await recordPayment(owner, tenantId, { amount: 500, status: 'pending' });

            const response = await request(app)
                .put(`/payments/${paymentId}`)
                .set(bearer(owner))
                .send({ amount: 550, status: 'completed' })
                .expect(200);

            expect(response.body.data.amount).toBe(550);
            expect(response.body.data.status).toBe('completed');
            expect(await totals()).toEqual({ tenant: 550, property: 550 });
        });
    });

    describe('DELETE /payments/:id', () => {
        it('should delete the payment', async () => {
            const paymentId = await recordPayment(owner, tenantId);

            await request(app).delete(`/payments/${paymentId}`).set(bearer(owner)).expect(200);

            const response = await request(app).get(`/payments/${paymentId}`).set(bearer(owner)).expect(404);
            expect(response.body.error).toBe('Payment not found');
        });
    });
});
