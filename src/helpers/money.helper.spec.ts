import { roundMoney, sumAmounts } from './money.helper';

describe('money helpers', () => {
    it('should round to cents', () => {
        expect(roundMoney(0.1 + 0.2)).toBe(0.3);
        expect(roundMoney(1.005)).toBe(1.01);
        expect(roundMoney(10)).toBe(10);
    });

    it('should sum amounts without drift', () => {
        expect(sumAmounts([{ amount: 0.1 }, { amount: 0.2 }, { amount: 0.7 }])).toBe(1);
        expect(sumAmounts([])).toBe(0);
    });
});
