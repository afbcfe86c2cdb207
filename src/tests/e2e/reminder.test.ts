import request from 'supertest';
import { app } from '../../app';
import { LoggingReminderChannel, ReminderChannel, reminderService } from '../../services/reminder.service';
import {
    bearer,
    cleanDatabase,
    createProperty,
    createTenant,
    registerOwner,
    teardownTests,
    TestOwner,
} from './setup';

class RecordingChannel implements ReminderChannel {
    readonly name = 'recording';
    readonly sent: Array<{ to: string; message: string }> = [];

    async send(to: string, message: string): Promise<void> {
        this.sent.push({ to, message });
    }
}

describe('Reminder E2E Tests', () => {
    let owner: TestOwner;
    let propertyId: string;
    let channel: RecordingChannel;

    beforeEach(async () => {
        await cleanDatabase();
        owner = await registerOwner();
        propertyId = await createProperty(owner, { name: 'Rowan Terrace', monthlyRent: 1100 });
        channel = new RecordingChannel();
        reminderService.useChannel(channel);
    });

    afterAll(async () => {
        reminderService.useChannel(new LoggingReminderChannel());
        await teardownTests();
    });

    it('should send the default message to the WhatsApp number', async () => {
        const tenantId = await createTenant(owner, propertyId, {
            name: 'Nia',
            phone: '5550123',
            whatsappNumber: '+15550123',
        });

        const response = await request(app)
            .post('/reminders/whatsapp')
            .set(bearer(owner))
            .send({ tenantId })
            .expect(200);

        const message = 'Hi Nia, this is a friendly reminder that your rent of 1100.00 for Rowan Terrace is due.';
        expect(response.body.message).toBe('WhatsApp reminder sent');
        expect(response.body.data).toEqual({ status: 'sent', channel: 'recording', to: '+15550123', message });
        expect(channel.sent).toEqual([{ to: '+15550123', message }]);
    });

    it('should fall back to the phone number and use the given message', async () => {
        const tenantId = await createTenant(owner, propertyId, { phone: '5550124', monthlyRent: 990 });

        await request(app)
            .post('/reminders/whatsapp')
            .set(bearer(owner))
            .send({ tenantId, message: 'Rent is due Friday' })
            .expect(200);

        expect(channel.sent).toEqual([{ to: '5550124', message: 'Rent is due Friday' }]);
    });

    it("should quote the tenant's own rent when set", async () => {
        const tenantId = await createTenant(owner, propertyId, { name: 'Ola', monthlyRent: 990.5 });

        const response = await request(app)
            .post('/reminders/whatsapp')
            .set(bearer(owner))
            .send({ tenantId })
            .expect(200);

        expect(response.body.data.message).toBe(
            'Hi Ola, this is a friendly reminder that your rent of 990.50 for Rowan Terrace is due.',
        );
    });

    it('should refuse tenants who moved out', async () => {
        const tenantId = await createTenant(owner, propertyId);
        await request(app).post(`/tenants/${tenantId}/move-out`).set(bearer(owner)).send({}).expect(200);

        const response = await request(app)
            .post('/reminders/whatsapp')
            .set(bearer(owner))
            .send({ tenantId })
            .expect(400);

        expect(response.body.error).toBe('Tenant has moved out');
        expect(channel.sent).toEqual([]);
    });
});
