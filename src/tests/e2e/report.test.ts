import request from 'supertest';
import { app } from '../../app';
import { bearer, cleanDatabase, registerOwner, seedPortfolio, teardownTests, TestOwner } from './setup';

describe('Report E2E Tests', () => {
    let owner: TestOwner;

    beforeEach(async () => {
        await cleanDatabase();
        owner = await registerOwner();
    });

    afterAll(async () => {
        await teardownTests();
    });

    it('should report per-property rows whose sums equal the totals', async () => {
        const { alder, birch } = await seedPortfolio(owner);

        const response = await request(app)
            .get('/reports/financial?from=2024-01-01&to=2024-01-31')
            .set(bearer(owner))
            .expect(200);

        expect(response.body.data).toEqual({
            from: '2024-01-01',
            to: '2024-01-31',
            properties: [
                { propertyId: alder, propertyName: 'Alder House', income: 1200, expenses: 300.25, net: 899.75 },
                { propertyId: birch, propertyName: 'Birch Flats', income: 950.5, expenses: 0, net: 950.5 },
            ],
            incomeByType: { rent: 2150.5 },
            expensesByCategory: { maintenance: 300.25 },
            totals: { income: 2150.5, expenses: 300.25, net: 1850.25 },
        });
    });

    it('should cover all dates when no range is given', async () => {
        await seedPortfolio(owner);

        const response = await request(app).get('/reports/financial').set(bearer(owner)).expect(200);

        expect(response.body.data.from).toBeNull();
        expect(response.body.data.totals).toEqual({ income: 3350.5, expenses: 350, net: 3000.5 });
    });

    it('should reject a reversed range', async () => {
        await request(app)
            .get('/reports/financial?from=2024-02-01&to=2024-01-01')
            .set(bearer(owner))
            .expect(400);
    });
});
