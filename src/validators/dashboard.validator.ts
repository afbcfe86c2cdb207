import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { paymentResponseSchema } from './payment.validator';

extendZodWithOpenApi(z);

export const dashboardSchema = z
    .object({
        totalProperties: z.number(),
        activeTenants: z.number(),
        monthlyIncome: z.number().openapi({ description: 'Sum of monthly rent over all properties' }),
        totalPayments: z.number(),
        totalExpenses: z.number(),
        netIncome: z.number(),
        pendingMaintenance: z.number(),
        recentPayments: z.array(paymentResponseSchema),
    })
    .openapi('Dashboard');

