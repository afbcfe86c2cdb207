import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { idSchema } from './common.validator';

extendZodWithOpenApi(z);

export const sendReminderSchema = z
    .object({
        tenantId: idSchema,
        message: z.string().trim().min(1).max(1000).optional().openapi({
            description: 'Defaults to a rent reminder naming the tenant, property and rent',
        }),
    })
    .openapi('SendReminderRequest');

export const reminderResponseSchema = z
    .object({
        status: z.literal('sent'),
        channel: z.string(),
        to: z.string(),
        message: z.string(),
    })
    .openapi('ReminderResult');

export type SendReminderInput = z.infer<typeof sendReminderSchema>;
export type ReminderResult = z.infer<typeof reminderResponseSchema>;
