import { describe, expect, it } from 'vitest';

import {
  assertWithinGrid,
  diminishTile,
  isArrowTile,
  isDirection,
  isWithinGrid,
  rotateDirection,
  tileDirection,
  turnAround,
  turnLeft,
  turnRight,
} from '../src/core/types';

describe('direction helpers', () => {
  it('turns clockwise and counter-clockwise', () => {
    expect(turnRight('up')).toBe('right');
    expect(turnRight('left')).toBe('up');
    expect(turnLeft('up')).toBe('left');
    expect(turnLeft('right')).toBe('up');
  });

  it('reverses each direction', () => {
    expect(turnAround('up')).toBe('down');
    expect(turnAround('down')).toBe('up');
    expect(turnAround('left')).toBe('right');
    expect(turnAround('right')).toBe('left');
  });

  it('rotates by any number of quarter turns', () => {
    expect(rotateDirection('up', 2)).toBe('down');
    expect(rotateDirection('up', -3)).toBe('right');
    expect(rotateDirection('down', 8)).toBe('down');
  });

  it('recognises direction strings only', () => {
    expect(isDirection('left')).toBe(true);
    expect(isDirection('left-half')).toBe(false);
    expect(isDirection(3)).toBe(false);
  });
});

describe('tile helpers', () => {
  it('shrinks full arrows to half arrows and half arrows to nothing', () => {
    expect(diminishTile('up')).toBe('up-half');
    expect(diminishTile('right')).toBe('right-half');
    expect(diminishTile('up-half')).toBe('empty');
    expect(diminishTile('left-half')).toBe('empty');
  });

  it('leaves non-arrow tiles unchanged when diminished', () => {
    expect(diminishTile('rocket')).toBe('rocket');
    expect(diminishTile('hole')).toBe('hole');
    expect(diminishTile('empty')).toBe('empty');
  });

  it('reports the direction an arrow tile points', () => {
    expect(tileDirection('down')).toBe('down');
    expect(tileDirection('left-half')).toBe('left');
    expect(tileDirection('hole')).toBeNull();
    expect(tileDirection('empty')).toBeNull();
    expect(isArrowTile('right-half')).toBe(true);
    expect(isArrowTile('rocket')).toBe(false);
  });
});

describe('grid bounds', () => {
  it('accepts cells of the 12x9 grid only', () => {
    expect(isWithinGrid(0, 0)).toBe(true);
    expect(isWithinGrid(11, 8)).toBe(true);
    expect(isWithinGrid(12, 0)).toBe(false);
    expect(isWithinGrid(0, 9)).toBe(false);
    expect(isWithinGrid(-1, 0)).toBe(false);
    expect(isWithinGrid(1.5, 0)).toBe(false);
  });

  it('names the offending cell when asserting', () => {
    expect(() => assertWithinGrid(12, 0)).toThrow('Cell 12,0 is outside the 12x9 grid');
  });
});
