import express, { Application } from 'express';
import swaggerUi from 'swagger-ui-express';
import { getConfig } from './lib/config';
import { requestLogger } from './middleware/request-logger';
import { errorHandler } from './middleware/error-handler';
import { requireAuth } from './middleware/auth-context';
import { authRouter } from './routes/auth';
import { dashboardRouter } from './routes/dashboard';
import { propertyRouter } from './routes/properties';
import { tenantRouter } from './routes/tenants';
import { paymentRouter } from './routes/payments';
import { expenseRouter } from './routes/expenses';
import { maintenanceRouter } from './routes/maintenance';
import { documentRouter } from './routes/documents';
import { reportRouter } from './routes/reports';
import { reminderRouter } from './routes/reminders';
import { generateOpenAPIDocument } from './config/swagger';

export const app: Application = express();

app.use(express.json());
if (getConfig().requestLogging) {
    app.use(requestLogger);
}

app.get('/health', (req, res) => {
    res.json({ status: 'healthy', service: 'rental-manager-service' });
});

// Swagger documentation
const openApiDocument = generateOpenAPIDocument();
app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
app.get('/openapi.json', (req, res) => {
    res.json(openApiDocument);
});

app.use('/auth', authRouter);

// Everything below is scoped to the owner in the access token
app.use('/dashboard', requireAuth, dashboardRouter);
app.use('/properties', requireAuth, propertyRouter);
app.use('/tenants', requireAuth, tenantRouter);
app.use('/payments', requireAuth, paymentRouter);
app.use('/expenses', requireAuth, expenseRouter);
app.use('/maintenance-requests', requireAuth, maintenanceRouter);
app.use('/documents', requireAuth, documentRouter);
app.use('/reports', requireAuth, reportRouter);
app.use('/reminders', requireAuth, reminderRouter);

app.use(errorHandler);
