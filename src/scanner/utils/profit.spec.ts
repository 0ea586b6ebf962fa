import { computeDirections, computeProfit } from './profit';
import { QUICKSWAP, rated, SUSHISWAP, tradeParams } from './fixtures';

describe('computeProfit', () => {
  const params = tradeParams('1000', 2, 5);

  it('nets gross proceeds against cost and gas', () => {
    const profit = computeProfit(
      rated(QUICKSWAP, '1.00', params),
      rated(SUSHISWAP, '1.02', params),
      params,
    );
    expect(profit.buy).toBe(QUICKSWAP);
    expect(profit.sell).toBe(SUSHISWAP);
    expect(profit.grossProceeds.toString()).toBe('1020');
    expect(profit.cost.toString()).toBe('1000');
    expect(profit.gasCost.toString()).toBe('2');
    expect(profit.netProfit.toString()).toBe('18');
  });

  it('goes negative when the spread does not cover gas', () => {
    const profit = computeProfit(
      rated(QUICKSWAP, '1.00', params),
      rated(SUSHISWAP, '1.001', params),
      params,
    );
    expect(profit.grossProceeds.toString()).toBe('1001');
    expect(profit.netProfit.toString()).toBe('-1');
  });

  it('depends on the rates, not on which venue plays which role', () => {
    const cases: Array<[string, string]> = [
      ['1825.123456', '1826.5'],
      ['0.000312', '0.000298'],
      ['1', '1'],
    ];
    for (const [x, y] of cases) {
      const aToB = computeProfit(
        rated(QUICKSWAP, x, params),
        rated(SUSHISWAP, y, params),
        params,
      );
      const bToA = computeProfit(
        rated(SUSHISWAP, x, params),
        rated(QUICKSWAP, y, params),
        params,
      );
      expect(aToB.netProfit.equals(bToA.netProfit)).toBe(true);
    }
  });

  it('swapping the rates flips the spread and pays gas both ways', () => {
    const forward = computeProfit(
      rated(QUICKSWAP, '1.00', params),
      rated(SUSHISWAP, '1.02', params),
      params,
    );
    const backward = computeProfit(
      rated(SUSHISWAP, '1.02', params),
      rated(QUICKSWAP, '1.00', params),
      params,
    );
    expect(backward.netProfit.toString()).toBe('-22');
    expect(forward.netProfit.plus(backward.netProfit).toString()).toBe('-4');
  });
});

describe('computeDirections', () => {
  const params = tradeParams('1', 0, 0);

  it('prices both directions for two venues, first-declared buy first', () => {
    const directions = computeDirections(
      [rated(QUICKSWAP, '10', params), rated(SUSHISWAP, '11', params)],
      params,
    );
    expect(directions.map((d) => `${d.buy.name}->${d.sell.name}`)).toEqual([
      'QuickSwap->SushiSwap',
      'SushiSwap->QuickSwap',
    ]);
    expect(directions.map((d) => d.netProfit.toString())).toEqual(['1', '-1']);
  });

  it('covers every ordered pair for more venues', () => {
    const third = { ...QUICKSWAP, name: 'ApeSwap' };
    const directions = computeDirections(
      [
        rated(QUICKSWAP, '10', params),
        rated(SUSHISWAP, '11', params),
        rated(third, '12', params),
      ],
      params,
    );
    expect(directions).toHaveLength(6);
  });
});
