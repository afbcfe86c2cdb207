import { dataSource } from '../lib/data-source';
import { NotFoundError } from '../lib/errors';
import DateHelper from '../helpers/date.helper';
import { PaginationHelper } from '../helpers/pagination.helper';
import { dateRangeCondition } from '../helpers/query.helper';
import { Expense } from '../entities/expense.entity';
import { findOwnedProperty } from './ownership';
import type {
    CreateExpenseInput,
    ExpenseListQuery,
    UpdateExpenseInput,
} from '../validators/expense.validator';

class ExpenseService {
    private get expenses() {
        return dataSource.getRepository(Expense);
    }

    async createExpense(ownerId: string, data: CreateExpenseInput) {
        const property = await findOwnedProperty(ownerId, data.propertyId);

        return this.expenses.save(
            this.expenses.create({
                propertyId: property.id,
                category: data.category,
                description: data.description ?? null,
                amount: data.amount,
                expenseDate: data.expenseDate ?? DateHelper.today(),
                vendor: data.vendor ?? null,
                receiptUrl: data.receiptUrl ?? null,
            }),
        );
    }

    async getExpenses(ownerId: string, query: ExpenseListQuery) {
        const [items, total] = await this.expenses.findAndCount({
            where: {
                property: { ownerId },
                propertyId: query.propertyId,
                category: query.category,
                expenseDate: dateRangeCondition(query.from, query.to),
            },
            order: { expenseDate: 'DESC', createdAt: 'DESC' },
            skip: PaginationHelper.getSkip(query.page, query.limit),
            take: PaginationHelper.getLimit(query.limit),
        });

        return PaginationHelper.paginate(items, total, query);
    }

    async getExpenseById(ownerId: string, id: string) {
        return this.findOwned(ownerId, id);
    }

    async updateExpense(ownerId: string, id: string, data: UpdateExpenseInput) {
        const expense = await this.findOwned(ownerId, id);

        if (data.propertyId && data.propertyId !== expense.propertyId) {
            await findOwnedProperty(ownerId, data.propertyId);
        }

        this.expenses.merge(expense, data);
        return this.expenses.save(expense);
    }

    async deleteExpense(ownerId: string, id: string) {
        const expense = await this.findOwned(ownerId, id);
        await this.expenses.delete({ id: expense.id });
        return { success: true };
    }

    private async findOwned(ownerId: string, id: string) {
        const expense = await this.expenses.findOneBy({ id, property: { ownerId } });
        if (!expense) {
            throw new NotFoundError('Expense not found');
        }
        return expense;
    }
}

export const expenseService = new ExpenseService();
