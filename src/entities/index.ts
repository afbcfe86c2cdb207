import { Owner } from './owner.entity';
import { RefreshToken } from './refresh-token.entity';
import { Property } from './property.entity';
import { Tenant } from './tenant.entity';
import { Payment } from './payment.entity';
import { Expense } from './expense.entity';
import { MaintenanceRequest } from './maintenance-request.entity';
import { Document } from './document.entity';

export { Owner, RefreshToken, Property, Tenant, Payment, Expense, MaintenanceRequest, Document };

export const ALL_ENTITIES = [
    Owner,
    RefreshToken,
    Property,
    Tenant,
    Payment,
    Expense,
    MaintenanceRequest,
    Document,
];
