import { In } from 'typeorm';
import { dataSource } from '../lib/data-source';
import { roundMoney, sumAmounts } from '../helpers/money.helper';
import { dateRangeCondition } from '../helpers/query.helper';
import { Property } from '../entities/property.entity';
import { Payment } from '../entities/payment.entity';
import { Expense } from '../entities/expense.entity';
import { PaymentStatus } from '../types/payment.type';
import type {
    FinancialReport,
    FinancialReportQuery,
    PropertyReportRow,
} from '../validators/report.validator';

type ReportProperty = Pick<Property, 'id' | 'name'>;
type ReportPayment = Pick<Payment, 'propertyId' | 'amount' | 'paymentType'>;
type ReportExpense = Pick<Expense, 'propertyId' | 'amount' | 'category'>;

function totalsBy<T extends { amount: number }>(records: T[], key: (record: T) => string): Record<string, number> {
    const totals: Record<string, number> = {};
    for (const record of records) {
        const bucket = key(record);
        totals[bucket] = (totals[bucket] ?? 0) + record.amount;
    }
    for (const bucket of Object.keys(totals)) {
        totals[bucket] = roundMoney(totals[bucket]);
    }
    return totals;
}

/**
 * Aggregates already-filtered payments and expenses per property.
 * Every property gets a row, including ones with no activity in the range.
 */
export function buildFinancialReport(
    range: FinancialReportQuery,
    properties: ReportProperty[],
    payments: ReportPayment[],
    expenses: ReportExpense[],
): FinancialReport {
    const rows: PropertyReportRow[] = properties.map((property) => {
        const income = sumAmounts(payments.filter((payment) => payment.propertyId === property.id));
        const spent = sumAmounts(expenses.filter((expense) => expense.propertyId === property.id));
        return {
            propertyId: property.id,
            propertyName: property.name,
            income,
            expenses: spent,
            net: roundMoney(income - spent),
        };
    });

    const income = roundMoney(rows.reduce((sum, row) => sum + row.income, 0));
    const spent = roundMoney(rows.reduce((sum, row) => sum + row.expenses, 0));

    return {
        from: range.from ?? null,
        to: range.to ?? null,
        properties: rows,
        incomeByType: totalsBy(payments, (payment) => payment.paymentType),
        expensesByCategory: totalsBy(expenses, (expense) => expense.category),
        totals: {
            income,
            expenses: spent,
            net: roundMoney(income - spent),
        },
    };
}

class ReportService {
    /**
     * Income counts completed payments only; the range is inclusive on both ends.
     */
    async getFinancialReport(ownerId: string, range: FinancialReportQuery): Promise<FinancialReport> {
        const properties = await dataSource.getRepository(Property).find({
            where: { ownerId },
            select: { id: true, name: true },
            order: { name: 'ASC' },
        });

        if (properties.length === 0) {
            return buildFinancialReport(range, [], [], []);
        }

        const propertyIds = In(properties.map((property) => property.id));
        const [payments, expenses] = await Promise.all([
            dataSource.getRepository(Payment).find({
                where: {
                    propertyId: propertyIds,
                    status: PaymentStatus.COMPLETED,
                    paymentDate: dateRangeCondition(range.from, range.to),
                },
                select: { propertyId: true, amount: true, paymentType: true },
            }),
            dataSource.getRepository(Expense).find({
                where: {
                    propertyId: propertyIds,
                    expenseDate: dateRangeCondition(range.from, range.to),
                },
                select: { propertyId: true, amount: true, category: true },
            }),
        ]);

        return buildFinancialReport(range, properties, payments, expenses);
    }
}

export const reportService = new ReportService();
