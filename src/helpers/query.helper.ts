import { Between, FindOperator, LessThanOrEqual, MoreThanOrEqual, Raw } from 'typeorm';

/**
 * Inclusive condition on a YYYY-MM-DD column; undefined when neither bound is set.
 */
export function dateRangeCondition(from?: string, to?: string): FindOperator<string> | undefined {
    if (from && to) {
        return Between(from, to);
    }
    if (from) {
        return MoreThanOrEqual(from);
    }
    if (to) {
        return LessThanOrEqual(to);
    }
    return undefined;
}

export function escapeLikePattern(term: string): string {
    return term.replace(/[\\%_]/g, '\\$&');
}

/**
 * Substring match where `%` and `_` in the term are literal characters.
 */
export function containsText(term: string): FindOperator<string> {
    return Raw((column) => `${column} LIKE :containsPattern ESCAPE '\\'`, {
        containsPattern: `%${escapeLikePattern(term)}%`,
    });
}
