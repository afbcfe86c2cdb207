import { Router, type Router as RouterType } from 'express';
import { successResponse } from '../lib/response';
import { getAuthContext } from '../middleware/auth-context';
import { sendReminderSchema } from '../validators/reminder.validator';
import { reminderService } from '../services/reminder.service';

export const reminderRouter: RouterType = Router();

// Rent reminder to the tenant's WhatsApp number (falls back to their phone)
reminderRouter.post('/whatsapp', async (req, res, next) => {
    try {
        const { ownerId } = getAuthContext(req);
        const data = sendReminderSchema.parse(req.body);
        const result = await reminderService.sendRentReminder(ownerId, data);
        res.json(successResponse(result, 'WhatsApp reminder sent'));
    } catch (error) {
        next(error);
    }
});
