import { describe, expect, it } from 'vitest';
import { squareCenter } from './board-surface.js';

const BOX = { x: 100, y: 50, width: 800, height: 800 };

describe('squareCenter', () => {
  it('maps squares with white at the bottom', () => {
    expect(squareCenter('a1', BOX, 'white')).toEqual({ x: 150, y: 800 });
    expect(squareCenter('e2', BOX, 'white')).toEqual({ x: 550, y: 700 });
    expect(squareCenter('h8', BOX, 'white')).toEqual({ x: 850, y: 100 });
  });

  it('mirrors both axes with black at the bottom', () => {
    expect(squareCenter('h8', BOX, 'black')).toEqual({ x: 150, y: 800 });
    expect(squareCenter('e2', BOX, 'black')).toEqual({ x: 450, y: 200 });
    expect(squareCenter('a1', BOX, 'black')).toEqual({ x: 850, y: 100 });
  });

  it('handles boards that are not square', () => {
    expect(squareCenter('a8', { x: 0, y: 0, width: 400, height: 480 }, 'white')).toEqual({ x: 25, y: 30 });
  });
});
