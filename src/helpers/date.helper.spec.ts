import DateHelper from './date.helper';

describe('DateHelper', () => {
    describe('isIsoDate', () => {
        it('should accept real calendar dates', () => {
            expect(DateHelper.isIsoDate('2024-02-29')).toBe(true);
            expect(DateHelper.isIsoDate('2023-12-31')).toBe(true);
        });

        it('should reject impossible dates and other formats', () => {
            expect(DateHelper.isIsoDate('2023-02-29')).toBe(false);
            expect(DateHelper.isIsoDate('2024-13-01')).toBe(false);
            expect(DateHelper.isIsoDate('01/02/2024')).toBe(false);
            expect(DateHelper.isIsoDate('2024-1-5')).toBe(false);
        });
    });

    it('should format a date as YYYY-MM-DD in UTC', () => {
        expect(DateHelper.formatDateToYYYYMMDD(new Date(Date.UTC(2024, 6, 4, 23, 30)))).toBe('2024-07-04');
    });

    describe('parseDurationToMs', () => {
        it('should convert each unit', () => {
            expect(DateHelper.parseDurationToMs('30s')).toBe(30_000);
            expect(DateHelper.parseDurationToMs('15m')).toBe(900_000);
            expect(DateHelper.parseDurationToMs('2h')).toBe(7_200_000);
            expect(DateHelper.parseDurationToMs('7d')).toBe(604_800_000);
        });

        it('should reject an unknown format', () => {
            expect(() => DateHelper.parseDurationToMs('15 minutes')).toThrow('Invalid duration format: 15 minutes');
        });
    });
});
