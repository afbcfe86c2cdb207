export enum PaymentMethod {
    CASH = 'cash',
    BANK_TRANSFER = 'bank_transfer',
    ONLINE = 'online',
    CHEQUE = 'cheque',
    OTHER = 'other',
}

export enum PaymentType {
    RENT = 'rent',
    SECURITY_DEPOSIT = 'security_deposit',
    MAINTENANCE = 'maintenance',
    OTHER = 'other',
}

/**
 * Only COMPLETED payments count towards income totals.
 */
export enum PaymentStatus {
    PENDING = 'pending',
    COMPLETED = 'completed',
    FAILED = 'failed',
}
