export enum DocumentType {
    LEASE = 'lease',
    INSURANCE = 'insurance',
    INSPECTION = 'inspection',
    RECEIPT = 'receipt',
    OTHER = 'other',
}
