import type { SolutionArrow } from "./world";
import type { Direction } from "./types";

/** Arrows the player still has in hand, per direction. */
export type ArrowStock = Record<Direction, number>;

export const createArrowStock = (): ArrowStock => ({
  up: 0,
  down: 0,
  left: 0,
  right: 0,
});

export const stockFromSolution = (arrows: ReadonlyArray<SolutionArrow>): ArrowStock => {
  const stock = createArrowStock();
  for (const arrow of arrows) {
    stock[arrow.direction] += 1;
  }
  return stock;
};

export const takeArrow = (stock: ArrowStock, direction: Direction): boolean => {
  if (stock[direction] <= 0) {
    return false;
  }
  stock[direction] -= 1;
  return true;
};

export const returnArrow = (stock: ArrowStock, direction: Direction): void => {
  stock[direction] += 1;
};

export const totalArrows = (stock: Readonly<ArrowStock>): number =>
  stock.up + stock.down + stock.left + stock.right;
