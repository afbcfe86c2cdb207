import { ValidationError } from '../lib/errors';
import { findOwnedTenant } from './ownership';
import type { ReminderResult, SendReminderInput } from '../validators/reminder.validator';

/**
 * Delivery transport for reminders (WhatsApp Business API, Twilio, ...).
 */
export interface ReminderChannel {
    readonly name: string;
    send(to: string, message: string): Promise<void>;
}

/**
 * Writes reminders to the log instead of delivering them.
 */
export class LoggingReminderChannel implements ReminderChannel {
    readonly name = 'log';

    async send(to: string, message: string): Promise<void> {
        console.log(JSON.stringify({ event: 'reminder.whatsapp', to, message }));
    }
}

export function defaultReminderMessage(tenantName: string, propertyName: string, rent: number): string {
    return `Hi ${tenantName}, this is a friendly reminder that your rent of ${rent.toFixed(2)} for ${propertyName} is due.`;
}

class ReminderService {
    private channel: ReminderChannel = new LoggingReminderChannel();

    useChannel(channel: ReminderChannel) {
        this.channel = channel;
    }

    async sendRentReminder(ownerId: string, data: SendReminderInput): Promise<ReminderResult> {
        const tenant = await findOwnedTenant(ownerId, data.tenantId);

        if (!tenant.isActive) {
            throw new ValidationError('Tenant has moved out');
        }

        const to = tenant.whatsappNumber ?? tenant.phone;
        const message = data.message
            ?? defaultReminderMessage(tenant.name, tenant.property.name, tenant.monthlyRent ?? tenant.property.monthlyRent);

        await this.channel.send(to, message);

        return { status: 'sent', channel: this.channel.name, to, message };
    }
}

export const reminderService = new ReminderService();
