import { dataSource } from '../lib/data-source';
import { NotFoundError, ValidationError } from '../lib/errors';
import DateHelper from '../helpers/date.helper';
import { PaginationHelper } from '../helpers/pagination.helper';
import { dateRangeCondition } from '../helpers/query.helper';
import { Payment } from '../entities/payment.entity';
import { findOwnedTenant } from './ownership';
import type {
    CreatePaymentInput,
    PaymentListQuery,
    UpdatePaymentInput,
} from '../validators/payment.validator';

class PaymentService {
    private get payments() {
        return dataSource.getRepository(Payment);
    }

    async createPayment(ownerId: string, data: CreatePaymentInput) {
        const tenant = await findOwnedTenant(ownerId, data.tenantId);

        if (data.propertyId && data.propertyId !== tenant.propertyId) {
            throw new ValidationError('Tenant does not live in the given property');
        }

        return this.payments.save(
            this.payments.create({
                propertyId: tenant.propertyId,
                tenantId: tenant.id,
                amount: data.amount,
                paymentDate: data.paymentDate ?? DateHelper.today(),
                paymentMethod: data.paymentMethod,
                paymentType: data.paymentType,
                status: data.status,
                notes: data.notes ?? null,
            }),
        );
    }

    /**
     * Newest payment date first.
     */
    async getPayments(ownerId: string, query: PaymentListQuery) {
        const [items, total] = await this.payments.findAndCount({
            where: {
                property: { ownerId },
                propertyId: query.propertyId,
                tenantId: query.tenantId,
                paymentType: query.paymentType,
                status: query.status,
                paymentDate: dateRangeCondition(query.from, query.to),
            },
            order: { paymentDate: 'DESC', createdAt: 'DESC' },
            skip: PaginationHelper.getSkip(query.page, query.limit),
            take: PaginationHelper.getLimit(query.limit),
        });

        return PaginationHelper.paginate(items, total, query);
    }

    async getPaymentById(ownerId: string, id: string) {
        const payment = await this.payments.findOne({
            where: { id, property: { ownerId } },
            relations: { tenant: true },
        });

        if (!payment) {
            throw new NotFoundError('Payment not found');
        }

        return payment;
    }

    async updatePayment(ownerId: string, id: string, data: UpdatePaymentInput) {
        const payment = await this.findOwned(ownerId, id);
        this.payments.merge(payment, data);
        return this.payments.save(payment);
    }

    async deletePayment(ownerId: string, id: string) {
        const payment = await this.findOwned(ownerId, id);
        await this.payments.delete({ id: payment.id });
        return { success: true };
    }

    private async findOwned(ownerId: string, id: string) {
        const payment = await this.payments.findOneBy({ id, property: { ownerId } });
        if (!payment) {
            throw new NotFoundError('Payment not found');
        }
        return payment;
    }
}

export const paymentService = new PaymentService();
