import type { ZodIssue } from 'zod';

export interface SuccessBody<T> {
    success: true;
    data: T;
    message?: string;
}

/**
 * `error` repeats `message`; `details` carries validation issues.
 */
export interface FailureBody {
    success: false;
    message: string;
    error: string;
    details?: ZodIssue[];
}

export interface PaginationMeta {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
}

export interface Page<T> {
    items: T[];
    pagination: PaginationMeta;
}

export function successResponse<T>(data: T, message?: string): SuccessBody<T> {
    return message === undefined ? { success: true, data } : { success: true, data, message };
}

export function errorResponse(message: string, details?: ZodIssue[]): FailureBody {
    const body: FailureBody = { success: false, message, error: message };
    if (details) {
        body.details = details;
    }
    return body;
}
