import { describe, expect, it } from 'vitest';

import {
  assertMapSize,
  cellIndex,
  createEmptyMapDescription,
  decodeEntityByte,
  decodeMap,
  encodeEntityByte,
  encodeMap,
  MAP_AUTHOR_OFFSET,
  MAP_SIZE,
  readMapAuthor,
  readMapName,
  TILE_BLOCK_OFFSET,
  WALL_BLOCK_OFFSET,
} from '../src/core/map-format';
import { readWall, resolveWallEdge, wallIndexAndMask, writeWall, WALL_BLOCK_SIZE } from '../src/core/walls';

describe('wall addressing', () => {
  it('packs top walls into the even bits, four cells per byte', () => {
    expect(wallIndexAndMask(0, 0, 'up')).toEqual({ index: 0, mask: 0b00000001 });
    expect(wallIndexAndMask(1, 0, 'up')).toEqual({ index: 0, mask: 0b00000100 });
    expect(wallIndexAndMask(2, 0, 'up')).toEqual({ index: 0, mask: 0b00010000 });
    expect(wallIndexAndMask(3, 0, 'up')).toEqual({ index: 0, mask: 0b01000000 });
    expect(wallIndexAndMask(4, 0, 'up')).toEqual({ index: 1, mask: 0b00000001 });
  });

  it('packs left walls into the odd bits', () => {
    expect(wallIndexAndMask(0, 0, 'left')).toEqual({ index: 0, mask: 0b00000010 });
    expect(wallIndexAndMask(3, 0, 'left')).toEqual({ index: 0, mask: 0b10000000 });
    expect(wallIndexAndMask(4, 0, 'left')).toEqual({ index: 1, mask: 0b00000010 });
  });

  it('stores down walls as the top wall of the cell below', () => {
    expect(wallIndexAndMask(0, 0, 'down')).toEqual({ index: 3, mask: 0b00000001 });
    expect(wallIndexAndMask(1, 0, 'down')).toEqual({ index: 3, mask: 0b00000100 });
    expect(wallIndexAndMask(4, 0, 'down')).toEqual({ index: 4, mask: 0b00000001 });
  });

  it('stores right walls as the left wall of the cell to the right', () => {
    expect(wallIndexAndMask(0, 0, 'right')).toEqual({ index: 0, mask: 0b00001000 });
    expect(wallIndexAndMask(2, 0, 'right')).toEqual({ index: 0, mask: 0b10000000 });
    expect(wallIndexAndMask(3, 0, 'right')).toEqual({ index: 1, mask: 0b00000010 });
  });

  it('wraps the owning cell around the grid edges', () => {
    expect(resolveWallEdge(4, 8, 'down')).toEqual({ x: 4, y: 0, edge: 'up' });
    expect(resolveWallEdge(11, 3, 'right')).toEqual({ x: 0, y: 3, edge: 'left' });
  });

  it('sets and clears single bits', () => {
    const block = new Uint8Array(WALL_BLOCK_SIZE);
    writeWall(block, 5, 2, 'right', true);

    expect(readWall(block, 6, 2, 'left')).toBe(true);
    expect(block[(2 * 12 + 6) >> 2]).toBe(0b00100000);

    writeWall(block, 6, 2, 'left', false);
    expect(readWall(block, 5, 2, 'right')).toBe(false);
    expect(block.every((byte) => byte === 0)).toBe(true);
  });

  it('rejects cells outside the grid', () => {
    expect(() => wallIndexAndMask(12, 0, 'up')).toThrow(RangeError);
  });
});

describe('entity bytes', () => {
  it('encodes entity, direction and arrow bits', () => {
    expect(encodeEntityByte({ entity: { kind: 'mouse', direction: 'right' }, arrow: null })).toBe(0b00111000);
    expect(encodeEntityByte({ entity: { kind: 'cat', direction: 'left' }, arrow: 'up' })).toBe(0b01010100);
    expect(encodeEntityByte({ entity: { kind: 'rocket' }, arrow: 'right' })).toBe(0b01100111);
    expect(encodeEntityByte({ entity: { kind: 'hole' }, arrow: null })).toBe(0b10000000);
    expect(encodeEntityByte({ entity: { kind: 'empty' }, arrow: 'down' })).toBe(0b00000101);
  });

  it('decodes each field', () => {
    expect(decodeEntityByte(0b00111000)).toEqual({ entity: { kind: 'mouse', direction: 'right' }, arrow: null });
    expect(decodeEntityByte(0b01001110)).toEqual({ entity: { kind: 'cat', direction: 'down' }, arrow: 'left' });
    expect(decodeEntityByte(0)).toEqual({ entity: { kind: 'empty' }, arrow: null });
  });

  it('rejects unknown entity codes', () => {
    expect(() => decodeEntityByte(0b10100000)).toThrow('Unknown entity code 5 in tile byte 0xa0');
    expect(() => decodeEntityByte(0b11100000)).toThrow(RangeError);
  });
});

describe('packed maps', () => {
  it('lays out the header, walls and tiles at fixed offsets', () => {
    expect(MAP_AUTHOR_OFFSET).toBe(32);
    expect(WALL_BLOCK_OFFSET).toBe(64);
    expect(TILE_BLOCK_OFFSET).toBe(91);
    expect(MAP_SIZE).toBe(199);
  });

  it('writes zero padded name and author fields', () => {
    const map = encodeMap(createEmptyMapDescription('Tiny', 'Me'));

    expect(Array.from(map.slice(0, 5))).toEqual([84, 105, 110, 121, 0]);
    expect(map[MAP_AUTHOR_OFFSET]).toBe(77);
    expect(readMapName(map)).toBe('Tiny');
    expect(readMapAuthor(map)).toBe('Me');
  });

  it('counts name length in UTF-8 bytes', () => {
    expect(() => encodeMap(createEmptyMapDescription('é'.repeat(17), 'Me'))).toThrow(
      'Map name "ééééééééééééééééé" is 34 bytes; the limit is 32',
    );
    expect(readMapName(encodeMap(createEmptyMapDescription('é'.repeat(16), 'Me')))).toBe('é'.repeat(16));
  });

  it('decodes what it encodes', () => {
    const description = createEmptyMapDescription('Sample', 'Tester');
    description.walls[cellIndex(2, 3)] = { up: true, left: true };
    description.cells[cellIndex(2, 3)] = { entity: { kind: 'cat', direction: 'up' }, arrow: 'right' };
    description.cells[cellIndex(11, 8)] = { entity: { kind: 'hole' }, arrow: null };

    const map = encodeMap(description);

    expect(map[TILE_BLOCK_OFFSET + cellIndex(2, 3)]).toBe(0b01000111);
    expect(decodeMap(map)).toEqual(description);
  });

  it('rejects buffers of the wrong size', () => {
    expect(() => assertMapSize(new Uint8Array(198))).toThrow('Packed map must be 199 bytes, got 198');
    expect(() => decodeMap(new Uint8Array(200))).toThrow(RangeError);
  });
});
