import type { Page } from '../lib/response';

export interface PaginationQuery {
    page: number;
    limit: number;
}

export class PaginationHelper {
    static readonly DEFAULT_LIMIT = 20;
    static readonly MAX_LIMIT = 100;

    /**
     * Calculate the number of records to skip for pagination
     */
    static getSkip(page?: number, limit?: number): number {
        const actualPage = Math.max(1, page || 1);
        const actualLimit = this.getLimit(limit);
        return (actualPage - 1) * actualLimit;
    }

    /**
     * Get validated limit (min: 1, max: 100, default: 20)
     */
    static getLimit(limit?: number): number {
        return Math.min(this.MAX_LIMIT, Math.max(1, limit || this.DEFAULT_LIMIT));
    }

    static paginate<T>(items: T[], total: number, query: PaginationQuery): Page<T> {
        const page = Math.max(1, query.page || 1);
        const limit = this.getLimit(query.limit);
        return {
            items,
            pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
        };
    }
}
