import { describe, expect, it } from 'vitest';

import {
  createArrowStock,
  returnArrow,
  stockFromSolution,
  takeArrow,
  totalArrows,
} from '../src/core/arrow-stock';

describe('arrow stock', () => {
  it('counts solution arrows per direction', () => {
    const stock = stockFromSolution([
      { x: 0, y: 0, direction: 'up' },
      { x: 1, y: 0, direction: 'up' },
      { x: 2, y: 0, direction: 'left' },
    ]);

    expect(stock).toEqual({ up: 2, down: 0, left: 1, right: 0 });
    expect(totalArrows(stock)).toBe(3);
  });

  it('hands out arrows until a direction runs dry', () => {
    const stock = createArrowStock();
    returnArrow(stock, 'right');

    expect(takeArrow(stock, 'right')).toBe(true);
    expect(takeArrow(stock, 'right')).toBe(false);
    expect(takeArrow(stock, 'down')).toBe(false);
    expect(stock.right).toBe(0);
  });
});
