import { Chess } from 'chess.js';
import { describe, expect, it } from 'vitest';
import { IllegalMoveError } from '../errors.js';
import { BoardTracker, START_FEN, parseUci } from './board-tracker.js';

function referenceFen(san: string[]): string {
  const chess = new Chess();
  for (const move of san) chess.move(move);
  return chess.fen();
}

describe('parseUci', () => {
  it('splits squares and promotion', () => {
    expect(parseUci('e2e4')).toEqual({ from: 'e2', to: 'e4' });
    expect(parseUci('E7E8Q')).toEqual({ from: 'e7', to: 'e8', promotion: 'q' });
  });

  it('rejects malformed moves', () => {
    expect(parseUci('e2e9')).toBeNull();
    expect(parseUci('e2')).toBeNull();
    expect(parseUci('e7e8k')).toBeNull();
  });
});

describe('BoardTracker', () => {
  it('starts from the initial position', () => {
    const tracker = new BoardTracker();
    expect(tracker.position()).toEqual({ fen: START_FEN, turn: 'w', moveNumber: 1, plies: 0 });
    expect(tracker.status()).toBe('ongoing');
    expect(tracker.result()).toBe('*');
  });

  it('plans a move without applying it', () => {
    const tracker = new BoardTracker();
    expect(tracker.plan('e2e4')).toEqual({ uci: 'e2e4', san: 'e4', from: 'e2', to: 'e4', side: 'white' });
    expect(tracker.position().fen).toBe(START_FEN);
  });

  it('applies a move', () => {
    const tracker = new BoardTracker();
    const position = tracker.apply('e2e4');
    expect(position.fen).toBe(referenceFen(['e4']));
    expect(position.turn).toBe('b');
    expect(position.plies).toBe(1);
    expect(tracker.history()).toEqual(['e4']);
  });

  it('rejects illegal and malformed moves without changing the position', () => {
    const tracker = new BoardTracker();
    expect(() => tracker.apply('e2e5')).toThrow(IllegalMoveError);
    expect(() => tracker.plan('xx')).toThrow(IllegalMoveError);
    expect(() => tracker.apply('e7e5')).toThrow(`move e7e5 is illegal in position ${START_FEN}`);
    expect(tracker.position().fen).toBe(START_FEN);
  });

  it('plans promotions', () => {
    const tracker = new BoardTracker('8/P7/8/8/8/2k5/8/7K w - - 0 1');
    expect(tracker.plan('a7a8q')).toEqual({
      uci: 'a7a8q',
      san: 'a8=Q',
      from: 'a7',
      to: 'a8',
      promotion: 'q',
      side: 'white',
    });
  });

  it('detects checkmate', () => {
    const tracker = new BoardTracker();
    for (const uci of ['f2f3', 'e7e5', 'g2g4', 'd8h4']) tracker.apply(uci);
    expect(tracker.status()).toBe('checkmate');
    expect(tracker.isTerminal()).toBe(true);
    expect(tracker.result()).toBe('0-1');
    expect(tracker.describeEnd()).toBe('checkmate, black wins');
    expect(tracker.history()).toEqual(['f3', 'e5', 'g4', 'Qh4#']);
  });

  it('detects stalemate', () => {
    const tracker = new BoardTracker('k7/8/1Q6/8/8/8/8/7K b - - 0 1');
    expect(tracker.status()).toBe('stalemate');
    expect(tracker.result()).toBe('1/2-1/2');
    expect(tracker.describeEnd()).toBe('stalemate');
  });

  it('detects insufficient material', () => {
    const tracker = new BoardTracker('k7/8/8/8/8/8/8/7K w - - 0 1');
    expect(tracker.status()).toBe('draw');
    expect(tracker.describeEnd()).toBe('draw by insufficient material');
  });

  it('replays a move list from the start', () => {
    const tracker = new BoardTracker();
    tracker.apply('d2d4');
    const position = tracker.replay(['e2e4', 'e7e5', 'g1f3']);
    expect(position.fen).toBe(referenceFen(['e4', 'e5', 'Nf3']));
    expect(tracker.history()).toEqual(['e4', 'e5', 'Nf3']);
  });

  it('leaves the position alone when a replay fails', () => {
    const tracker = new BoardTracker();
    tracker.apply('e2e4');
    expect(() => tracker.replay(['e2e4', 'e2e4'])).toThrow(IllegalMoveError);
    expect(tracker.position().fen).toBe(referenceFen(['e4']));
  });

  it('resets to the starting position', () => {
    const tracker = new BoardTracker();
    tracker.apply('g1f3');
    tracker.reset();
    expect(tracker.position().fen).toBe(START_FEN);
    expect(tracker.history()).toEqual([]);
  });
});
