import request from 'supertest';
import { app } from '../../app';
import {
    bearer,
    cleanDatabase,
    createProperty,
    createTenant,
    registerOwner,
    teardownTests,
    TestOwner,
} from './setup';

describe('Maintenance Request E2E Tests', () => {
    let owner: TestOwner;
    let propertyId: string;

    beforeEach(async () => {
        await cleanDatabase();
        owner = await registerOwner();
        propertyId = await createProperty(owner);
    });

    afterAll(async () => {
        await teardownTests();
    });

    async function openRequest(body: Record<string, unknown> = {}): Promise<string> {
        const response = await request(app)
            .post('/maintenance-requests')
            .set(bearer(owner))
            .send({ propertyId, description: 'Leaking tap', ...body })
            .expect(201);
        return response.body.data.id;
    }

    function changeStatus(id: string, status: string) {
        return request(app)
            .patch(`/maintenance-requests/${id}/status`)
            .set(bearer(owner))
            .send({ status });
    }

    describe('POST /maintenance-requests', () => {
        it('should open a request with defaults', async () => {
            const response = await request(app)
                .post('/maintenance-requests')
                .set(bearer(owner))
                .send({ propertyId, description: 'No hot water', issueType: 'plumbing' })
                .expect(201);

            expect(response.body.data).toMatchObject({
                propertyId,
                tenantId: null,
                issueType: 'plumbing',
                description: 'No hot water',
                priority: 'medium',
                status: 'open',
                resolvedAt: null,
            });
        });

        it('should reject a tenant from another property', async () => {
            const otherPropertyId = await createProperty(owner);
            const tenantId = await createTenant(owner, otherPropertyId);

            const response = await request(app)
                .post('/maintenance-requests')
                .set(bearer(owner))
                .send({ propertyId, tenantId, description: 'Door jammed' })
                .expect(400);

            expect(response.body.error).toBe('Tenant does not live in the given property');
        });
    });

    describe('PATCH /maintenance-requests/:id/status', () => {
        it('should follow open, in_progress, completed and stamp resolvedAt', async () => {
            const id = await openRequest();

            const started = await changeStatus(id, 'in_progress').expect(200);
            expect(started.body.data.status).toBe('in_progress');
            expect(started.body.data.resolvedAt).toBeNull();

            const completed = await changeStatus(id, 'completed').expect(200);
            expect(completed.body.data.status).toBe('completed');
            expect(completed.body.data.resolvedAt).not.toBeNull();
        });

        it('should allow re-opening a request in progress', async () => {
            const id = await openRequest();
            await changeStatus(id, 'in_progress').expect(200);

            const reopened = await changeStatus(id, 'open').expect(200);
            expect(reopened.body.data.status).toBe('open');
        });

        it('should treat completed as terminal', async () => {
            const id = await openRequest();
            await changeStatus(id, 'completed').expect(200);

            const response = await changeStatus(id, 'open').expect(409);
            expect(response.body.error).toBe('Cannot change status from completed to open');

            await changeStatus(id, 'in_progress').expect(409);
        });

        it('should accept the current status as a no-op', async () => {
            const id = await openRequest();

            const response = await changeStatus(id, 'open').expect(200);
            expect(response.body.data.status).toBe('open');
        });

        it('should reject an unknown status', async () => {
            const id = await openRequest();

            await changeStatus(id, 'closed').expect(400);
        });
    });

    describe('GET /maintenance-requests', () => {
        it('should filter by status and priority', async () => {
            const done = await openRequest({ priority: 'high' });
            await openRequest({ priority: 'high' });
            await openRequest({ priority: 'low' });
            await changeStatus(done, 'completed').expect(200);

            const open = await request(app)
                .get('/maintenance-requests?status=open')
                .set(bearer(owner))
                .expect(200);
            expect(open.body.data.pagination.total).toBe(2);

            const urgentOpen = await request(app)
                .get('/maintenance-requests?status=open&priority=high')
                .set(bearer(owner))
                .expect(200);
            expect(urgentOpen.body.data.pagination.total).toBe(1);
        });
    });

    describe('PUT /maintenance-requests/:id', () => {
        it('should update the description and priority', async () => {
            const id = await openRequest();

            const response = await request(app)
                .put(`/maintenance-requests/${id}`)
                .set(bearer(owner))
                .send({ description: 'Leaking tap in the bathroom', priority: 'urgent' })
                .expect(200);

            expect(response.body.data.description).toBe('Leaking tap in the bathroom');
            expect(response.body.data.priority).toBe('urgent');
            expect(response.body.data.status).toBe('open');
        });
    });

    describe('DELETE /maintenance-requests/:id', () => {
        it('should delete the request', async () => {
            const id = await openRequest();

            await request(app).delete(`/maintenance-requests/${id}`).set(bearer(owner)).expect(200);

            const response = await request(app).get(`/maintenance-requests/${id}`).set(bearer(owner)).expect(404);
            expect(response.body.error).toBe('Maintenance request not found');
        });
    });
});
