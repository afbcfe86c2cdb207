/**
 * Rounds to cents. Amounts are stored as doubles, so sums drift (0.1 + 0.2).
 */
export function roundMoney(value: number): number {
    return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function sumAmounts<T extends { amount: number }>(records: T[]): number {
    return roundMoney(records.reduce((sum, record) => sum + record.amount, 0));
}
