const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export default class DateHelper {
    /**
     * True for a real calendar date written as YYYY-MM-DD (rejects 2024-02-30).
     */
    public static isIsoDate(value: string): boolean {
        const match = ISO_DATE.exec(value);
        if (!match) {
            return false;
        }
        const [, year, month, day] = match;
        const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
        return (
            date.getUTCFullYear() === Number(year) &&
            date.getUTCMonth() === Number(month) - 1 &&
            date.getUTCDate() === Number(day)
        );
    }

    public static formatDateToYYYYMMDD(date: Date): string {
        return date.toISOString().split('T')[0];
    }

    public static today(): string {
        return this.formatDateToYYYYMMDD(new Date());
    }

    /**
     * Converts a duration such as `15m` or `7d` to milliseconds.
     */
    public static parseDurationToMs(duration: string): number {
        const match = duration.match(/^(\d+)([smhd])$/);
        if (!match) {
            throw new Error(`Invalid duration format: ${duration}`);
        }

        const value = parseInt(match[1], 10);
        const unit = match[2];

        switch (unit) {
            case 's': return value * 1000;
            case 'm': return value * 60 * 1000;
            case 'h': return value * 60 * 60 * 1000;
            case 'd': return value * 24 * 60 * 60 * 1000;
            default: throw new Error(`Unknown time unit: ${unit}`);
        }
    }
}
