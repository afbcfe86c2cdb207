export enum ExpenseCategory {
    MAINTENANCE = 'maintenance',
    UTILITIES = 'utilities',
    TAXES = 'taxes',
    INSURANCE = 'insurance',
    MORTGAGE = 'mortgage',
    MANAGEMENT = 'management',
    OTHER = 'other',
}
