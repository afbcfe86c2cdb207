import { In, Not } from 'typeorm';
import { dataSource } from '../lib/data-source';
import { roundMoney } from '../helpers/money.helper';
import { Property } from '../entities/property.entity';
import { Tenant } from '../entities/tenant.entity';
import { Payment } from '../entities/payment.entity';
import { Expense } from '../entities/expense.entity';
import { MaintenanceRequest } from '../entities/maintenance-request.entity';
import { PaymentStatus } from '../types/payment.type';
import { MaintenanceStatus } from '../types/maintenance.type';
import { ownedPropertyIds } from './ownership';

export const RECENT_PAYMENTS_LIMIT = 5;

export interface DashboardStats {
    totalProperties: number;
    activeTenants: number;
    monthlyIncome: number;
    totalPayments: number;
    totalExpenses: number;
    netIncome: number;
    pendingMaintenance: number;
    recentPayments: Payment[];
}

class DashboardService {
    async getStats(ownerId: string): Promise<DashboardStats> {
        const propertyIds = await ownedPropertyIds(ownerId);

        if (propertyIds.length === 0) {
            return {
                totalProperties: 0,
                activeTenants: 0,
                monthlyIncome: 0,
                totalPayments: 0,
                totalExpenses: 0,
                netIncome: 0,
                pendingMaintenance: 0,
                recentPayments: [],
            };
        }

        const inPortfolio = In(propertyIds);
        const [activeTenants, monthlyRent, paid, spent, pendingMaintenance, recentPayments] = await Promise.all([
            dataSource.getRepository(Tenant).countBy({ propertyId: inPortfolio, isActive: true }),
            dataSource.getRepository(Property).sum('monthlyRent', { ownerId }),
            dataSource.getRepository(Payment).sum('amount', {
                propertyId: inPortfolio,
                status: PaymentStatus.COMPLETED,
            }),
            dataSource.getRepository(Expense).sum('amount', { propertyId: inPortfolio }),
            dataSource.getRepository(MaintenanceRequest).countBy({
                propertyId: inPortfolio,
                status: Not(MaintenanceStatus.COMPLETED),
            }),
            dataSource.getRepository(Payment).find({
                where: { propertyId: inPortfolio },
                order: { paymentDate: 'DESC', createdAt: 'DESC' },
                take: RECENT_PAYMENTS_LIMIT,
            }),
        ]);

        const totalPayments = roundMoney(paid ?? 0);
        const totalExpenses = roundMoney(spent ?? 0);

        return {
            totalProperties: propertyIds.length,
            activeTenants,
            monthlyIncome: roundMoney(monthlyRent ?? 0),
            totalPayments,
            totalExpenses,
            netIncome: roundMoney(totalPayments - totalExpenses),
            pendingMaintenance,
            recentPayments,
        };
    }
}

export const dashboardService = new DashboardService();
