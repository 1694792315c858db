/**
 * GoBoard Tests
 *
 * Placement, capture, ko, suicide, groups and board output.
 */

import { describe, it, expect } from 'vitest';
import { GoBoard, createBoard } from '../src/go/GoBoard.js';
import { toIndex } from '../src/go/GoCoordinates.js';
import { Intersection } from '../src/go/types.js';

const EMPTY_ROW = '.........';

/** 9x9 diagram from the rows given, padded with empty rows at the bottom */
function diagram(...rows: string[]): string[] {
  return [...rows, ...Array<string>(9 - rows.length).fill(EMPTY_ROW)];
}

function load(rows: string[], toMove: 'b' | 'w' = 'b'): GoBoard {
  const board = GoBoard.fromDiagram(rows, { toMove });
  if (!board) throw new Error('bad test diagram');
  return board;
}

function at(column: Intersection['column'], row: number): Intersection {
  return { column, row };
}

function index(column: Intersection['column'], row: number): number {
  const i = toIndex({ column, row }, 9);
  if (i === undefined) throw new Error('bad test point');
  return i;
}

// E6 black, D5 black, E4 black; white F6, E5, G5, F4. Black F5 takes E5.
const KO_SHAPE = diagram(
  EMPTY_ROW,
  EMPTY_ROW,
  EMPTY_ROW,
  '....XO...',
  '...XO.O..',
  '....XO...',
);

describe('GoBoard', () => {
  describe('Construction', () => {
    it('should start empty with Black to move', () => {
      const board = createBoard(9);
      expect(board.size).toBe(9);
      expect(board.isEmptyBoard()).toBe(true);
      expect(board.toMove).toBe('b');
      expect(board.komi).toBe(6.5);
      expect(board.ko).toBeNull();
      expect(board.moveNumber).toBe(0);
      expect(board.captures).toEqual({ b: 0, w: 0 });
    });

    it('should surround the playable area with offboard cells', () => {
      const board = new GoBoard(9);
      expect(board.cellCount).toBe(121);
      expect(board.cellAt(0)).toBe('offboard');
      expect(board.cellAt(11)).toBe('offboard');
      expect(board.cellAt(12)).toBe('empty');
      expect(board.cellAt(120)).toBe('offboard');
    });

    it('should default to a 19x19 board', () => {
      expect(new GoBoard().size).toBe(19);
    });
  });

  describe('Diagrams', () => {
    it('should read the first row as the highest row', () => {
      const board = load(diagram('X........', '.O.......'));
      expect(board.stateAt(at('A', 9))).toBe('b');
      expect(board.stateAt(at('B', 8))).toBe('w');
      expect(board.stateAt(at('A', 1))).toBe('empty');
    });

    it('should ignore whitespace inside rows', () => {
      const board = load(diagram('X . . . . . . . O'));
      expect(board.stateAt(at('A', 9))).toBe('b');
      expect(board.stateAt(at('J', 9))).toBe('w');
    });

    it('should reject malformed diagrams', () => {
      expect(GoBoard.fromDiagram(['X..'])).toBeUndefined();
      expect(GoBoard.fromDiagram(diagram('X.......'))).toBeUndefined();
      expect(GoBoard.fromDiagram(diagram('X.......?'))).toBeUndefined();
    });

    it('should reject a ko point that is occupied', () => {
      expect(GoBoard.fromDiagram(diagram('X........'), { ko: at('A', 9) })).toBeUndefined();
      expect(GoBoard.fromDiagram(diagram('X........'), { ko: at('B', 9) })?.ko).toBe(13);
    });

    it('should apply diagram options', () => {
      const board = GoBoard.fromDiagram(diagram(), { toMove: 'w', komi: 0.5, moveNumber: 40 });
      expect(board?.toMove).toBe('w');
      expect(board?.komi).toBe(0.5);
      expect(board?.moveNumber).toBe(40);
    });

    it('should write the same rows back out', () => {
      const rows = diagram('X.......O', '...XO....');
      expect(load(rows).toDiagram()).toEqual(rows);
    });
  });

  describe('Placement', () => {
    it('should place a stone and hand the move to the opponent', () => {
      const board = new GoBoard(9);
      expect(board.tryPlay({ type: 'place', intersection: at('E', 5), color: 'b' })).toEqual({ ok: true, captured: 0 });
      expect(board.stateAt(at('E', 5))).toBe('b');
      expect(board.toMove).toBe('w');
      expect(board.moveNumber).toBe(1);
      expect(board.lastMove).toEqual({ type: 'place', intersection: at('E', 5), color: 'b' });
    });

    it('should refuse an occupied point', () => {
      const board = new GoBoard(9);
      board.play({ type: 'place', intersection: at('E', 5), color: 'b' });
      expect(board.tryPlay({ type: 'place', intersection: at('E', 5), color: 'w' })).toEqual({ ok: false, reason: 'occupied' });
      expect(board.toMove).toBe('w');
      expect(board.moveNumber).toBe(1);
    });

    it('should refuse points off the board', () => {
      const board = new GoBoard(9);
      expect(board.tryPlay({ type: 'place', intersection: at('K', 1), color: 'b' })).toEqual({ ok: false, reason: 'out_of_bounds' });
      expect(board.tryPlay({ type: 'place', intersection: at('A', 10), color: 'b' })).toEqual({ ok: false, reason: 'out_of_bounds' });
    });

    it('should not enforce turn order', () => {
      const board = new GoBoard(9);
      expect(board.play({ type: 'place', intersection: at('E', 5), color: 'b' })).toBe(true);
      expect(board.play({ type: 'place', intersection: at('D', 5), color: 'b' })).toBe(true);
      expect(board.toMove).toBe('w');
    });

    it('should refuse resign as a board move', () => {
      expect(new GoBoard(9).tryPlay({ type: 'resign' })).toEqual({ ok: false, reason: 'resign' });
    });

    it('should throw when asked to play on the border', () => {
      expect(() => new GoBoard(9).playAt(0, 'b')).toThrow('offboard index 0');
    });

    it('should place setup stones without changing the turn', () => {
      const board = new GoBoard(9);
      expect(board.placeStone(at('C', 3), 'w')).toBe(true);
      expect(board.placeStone(at('C', 3), 'b')).toBe(false);
      expect(board.stateAt(at('C', 3))).toBe('w');
      expect(board.toMove).toBe('b');
      expect(board.moveNumber).toBe(0);
    });
  });

  describe('Captures', () => {
    it('should remove a surrounded stone and count it', () => {
      const board = load(diagram(EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, '....X....', '...XOX...'));
      const result = board.tryPlay({ type: 'place', intersection: at('E', 4), color: 'b' });

      expect(result).toEqual({ ok: true, captured: 1 });
      expect(board.stateAt(at('E', 5))).toBe('empty');
      expect(board.captures).toEqual({ b: 1, w: 0 });
      expect(board.ko).toBeNull();
    });

    it('should let White capture a surrounded stone on 19x19', () => {
      const board = new GoBoard(19);
      board.play({ type: 'place', intersection: at('D', 4), color: 'b' });
      board.play({ type: 'place', intersection: at('D', 3), color: 'w' });
      board.play({ type: 'place', intersection: at('D', 5), color: 'w' });
      board.play({ type: 'place', intersection: at('C', 4), color: 'w' });

      expect(board.tryPlay({ type: 'place', intersection: at('E', 4), color: 'w' })).toEqual({ ok: true, captured: 1 });
      expect(board.stateAt(at('D', 4))).toBe('empty');
      expect(board.captures).toEqual({ b: 0, w: 1 });
    });

    it('should capture several groups with one move', () => {
      const board = load(diagram(
        EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW,
        'XXX......',
        'O.OX.....',
      ));
      const result = board.tryPlay({ type: 'place', intersection: at('B', 1), color: 'b' });

      expect(result).toEqual({ ok: true, captured: 2 });
      expect(board.stateAt(at('A', 1))).toBe('empty');
      expect(board.stateAt(at('C', 1))).toBe('empty');
      expect(board.captures.b).toBe(2);
      expect(board.ko).toBeNull();
    });

    it('should capture a whole chain', () => {
      const board = load(diagram(
        EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW,
        'X........',
        'OOX......',
        'XX.......',
      ));
      expect(board.tryPlay({ type: 'place', intersection: at('B', 3), color: 'b' })).toEqual({ ok: true, captured: 2 });
      expect(board.stateAt(at('A', 2))).toBe('empty');
      expect(board.stateAt(at('B', 2))).toBe('empty');
    });
  });

  describe('Suicide', () => {
    it('should refuse a move that leaves its own group without liberties', () => {
      const board = load(diagram(...Array<string>(7).fill(EMPTY_ROW), 'X........', '.X.......'), 'w');
      const before = board.toJSON();
      const result = board.tryPlay({ type: 'place', intersection: at('A', 1), color: 'w' });
      expect(board.toJSON()).toEqual(before);

      expect(result).toEqual({ ok: false, reason: 'suicide' });
      expect(board.stateAt(at('A', 1))).toBe('empty');
      expect(board.toMove).toBe('w');
      expect(board.moveNumber).toBe(0);
      expect(board.isLegalAt(index('A', 1), 'w')).toBe(false);
    });

    it('should allow a move without liberties when it captures', () => {
      const board = load(diagram(...Array<string>(7).fill(EMPTY_ROW), 'XO.......', 'O.O......'));
      const result = board.tryPlay({ type: 'place', intersection: at('B', 1), color: 'b' });

      expect(result).toEqual({ ok: true, captured: 1 });
      expect(board.stateAt(at('A', 1))).toBe('empty');
      expect(board.koIntersection()).toEqual(at('A', 1));
    });
  });

  describe('Ko', () => {
    it('should set the ko point when a single stone is taken inside an enemy diamond', () => {
      const board = load(KO_SHAPE);
      expect(board.tryPlay({ type: 'place', intersection: at('F', 5), color: 'b' })).toEqual({ ok: true, captured: 1 });
      expect(board.ko).toBe(60);
      expect(board.koIntersection()).toEqual(at('E', 5));
    });

    it('should refuse the immediate recapture', () => {
      const board = load(KO_SHAPE);
      board.play({ type: 'place', intersection: at('F', 5), color: 'b' });

      expect(board.tryPlay({ type: 'place', intersection: at('E', 5), color: 'w' })).toEqual({ ok: false, reason: 'ko' });
      expect(board.isLegalAt(60, 'w')).toBe(false);
      expect(board.toMove).toBe('w');
    });

    it('should clear the ko point after any other move and allow the retake', () => {
      const board = load(KO_SHAPE);
      board.play({ type: 'place', intersection: at('F', 5), color: 'b' });
      board.play({ type: 'place', intersection: at('A', 1), color: 'w' });
      expect(board.ko).toBeNull();

      board.play({ type: 'place', intersection: at('B', 1), color: 'b' });
      expect(board.tryPlay({ type: 'place', intersection: at('E', 5), color: 'w' })).toEqual({ ok: true, captured: 1 });
      expect(board.koIntersection()).toEqual(at('F', 5));
    });

    it('should keep the ko point across a pass', () => {
      const board = load(KO_SHAPE);
      board.play({ type: 'place', intersection: at('F', 5), color: 'b' });
      board.play({ type: 'pass' });
      expect(board.ko).toBe(60);
    });
  });

  describe('Passing', () => {
    it('should flip the side to move and count consecutive passes', () => {
      const board = new GoBoard(9);
      expect(board.tryPlay({ type: 'pass' })).toEqual({ ok: true, captured: 0 });
      expect(board.toMove).toBe('w');
      expect(board.consecutivePasses).toBe(1);
      expect(board.moveNumber).toBe(1);
      expect(board.lastMove).toEqual({ type: 'pass' });
      expect(board.isGameOver()).toBe(false);

      board.play({ type: 'pass' });
      expect(board.isGameOver()).toBe(true);
    });

    it('should reset the pass count when a stone is placed', () => {
      const board = new GoBoard(9);
      board.play({ type: 'pass' });
      board.play({ type: 'place', intersection: at('C', 3), color: 'w' });
      board.play({ type: 'pass' });
      expect(board.consecutivePasses).toBe(1);
      expect(board.isGameOver()).toBe(false);
    });
  });

  describe('Groups', () => {
    it('should collect stones and liberties of a chain', () => {
      const board = load(diagram(...Array<string>(8).fill(EMPTY_ROW), 'XX.......'));
      const group = board.findGroup(index('A', 1), 'b');
      expect([...group.stones].sort((a, b) => a - b)).toEqual([100, 101]);
      expect([...group.liberties].sort((a, b) => a - b)).toEqual([89, 90, 102]);
    });

    it('should list each shared liberty once', () => {
      const board = load(diagram(...Array<string>(7).fill(EMPTY_ROW), 'X........', 'X.X......'));
      board.placeStone(at('B', 2), 'b');
      const group = board.findGroup(index('A', 1), 'b');
      expect(group.stones).toHaveLength(3);
      expect([...group.liberties].sort((a, b) => a - b)).toEqual([78, 79, 91, 101]);
    });

    it('should return the liberties of the weakest group', () => {
      const board = load(diagram(EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, '....X....', EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, 'X........'));
      expect([...board.weakestGroup('b')].sort((a, b) => a - b)).toEqual([89, 101]);
      expect(board.weakestGroup('w')).toEqual([]);
      expect(board.findWeakestGroup('w')).toBeUndefined();
    });

    it('should prefer the first group in index order on ties', () => {
      const board = load(diagram('....X....', EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, EMPTY_ROW, '....X....'));
      expect(board.findWeakestGroup('b')?.stones).toEqual([index('E', 9)]);
    });

    it('should treat an empty seed as its own liberty', () => {
      const group = new GoBoard(9).findGroup(60, 'b');
      expect(group.stones).toEqual([]);
      expect(group.liberties).toEqual([60]);
    });
  });

  describe('Diamonds', () => {
    it('should report a point surrounded by one color, ignoring the border', () => {
      const board = load(diagram(...Array<string>(7).fill(EMPTY_ROW), 'X........', '.X.......'));
      expect(board.diamond(at('A', 1))).toBe('b');
    });

    it('should report nothing next to an empty point', () => {
      expect(new GoBoard(9).diamond(at('E', 5))).toBeUndefined();
    });

    it('should report nothing for mixed colors', () => {
      const board = load(diagram(...Array<string>(7).fill(EMPTY_ROW), '.X.......', 'O.X......'));
      expect(board.diamond(at('B', 1))).toBeUndefined();
    });

    it('should report nothing for offboard cells', () => {
      expect(new GoBoard(9).diamondAt(0)).toBeUndefined();
    });
  });

  describe('Legality', () => {
    it('should allow every point of an empty board', () => {
      expect(new GoBoard(9).legalPlacements('b')).toHaveLength(81);
    });

    it('should exclude occupied and suicidal points', () => {
      const board = load(diagram(...Array<string>(7).fill(EMPTY_ROW), 'X........', '.X.......'));
      const legal = board.legalPlacements('w');
      expect(legal).toHaveLength(78);
      expect(legal).not.toContain(index('A', 1));
      expect(board.legalPlacements('b')).toContain(index('A', 1));
    });
  });

  describe('Copies', () => {
    it('should not share state with a clone', () => {
      const board = new GoBoard(9);
      const copy = board.clone();
      copy.play({ type: 'place', intersection: at('E', 5), color: 'b' });

      expect(board.stateAt(at('E', 5))).toBe('empty');
      expect(board.toMove).toBe('b');
      expect(board.moveNumber).toBe(0);
      expect(copy.stateAt(at('E', 5))).toBe('b');
    });

    it('should compare positions without counters', () => {
      const a = new GoBoard(9);
      const b = new GoBoard(9);
      a.setKomi(0.5);
      b.play({ type: 'pass' });
      b.play({ type: 'pass' });
      expect(a.samePosition(b)).toBe(true);

      b.setToMove('w');
      expect(a.samePosition(b)).toBe(false);
    });

    it('should rebuild from a snapshot', () => {
      const board = load(KO_SHAPE);
      board.play({ type: 'place', intersection: at('F', 5), color: 'b' });

      const restored = GoBoard.fromSnapshot(board.toJSON());
      expect(restored?.samePosition(board)).toBe(true);
      expect(restored?.captures).toEqual({ b: 1, w: 0 });
      expect(restored?.moveNumber).toBe(1);
      expect(restored?.lastMove).toEqual({ type: 'place', intersection: at('F', 5), color: 'b' });
    });

    it('should clear stones and counters but keep komi', () => {
      const board = new GoBoard(9);
      board.setKomi(0.5);
      board.play({ type: 'place', intersection: at('E', 5), color: 'b' });
      board.play({ type: 'pass' });
      board.clear();

      expect(board.isEmptyBoard()).toBe(true);
      expect(board.toMove).toBe('b');
      expect(board.moveNumber).toBe(0);
      expect(board.consecutivePasses).toBe(0);
      expect(board.komi).toBe(0.5);
    });
  });

  describe('Rendering', () => {
    it('should draw rows from the top with a column legend and status lines', () => {
      const board = new GoBoard(9);
      board.play({ type: 'place', intersection: at('A', 9), color: 'b' });
      board.play({ type: 'place', intersection: at('J', 1), color: 'w' });
      const lines = board.render().split('\n');

      expect(lines).toHaveLength(13);
      expect(lines[0]).toBe(' 9 X . . . . . . . .');
      expect(lines[1]).toBe(' 8 . . . . . . . . .');
      expect(lines[8]).toBe(' 1 . . . . . . . . O');
      expect(lines[9]).toBe('   A B C D E F G H J');
      expect(lines[10]).toBe('Komi:     6.5');
      expect(lines[11]).toBe('Ko:       None');
      expect(lines[12]).toBe('Captures: [B: 0, W: 0]');
    });

    it('should right-align two-digit row labels', () => {
      const lines = new GoBoard(19).renderGrid().split('\n');
      expect(lines[0].startsWith('19 .')).toBe(true);
      expect(lines[10].startsWith(' 9 .')).toBe(true);
      expect(lines[19]).toBe('   A B C D E F G H J K L M N O P Q R S T');
    });

    it('should show the ko point and captures', () => {
      const board = load(KO_SHAPE);
      board.play({ type: 'place', intersection: at('F', 5), color: 'b' });
      expect(board.renderStatus()).toBe('Komi:     6.5\nKo:       E5\nCaptures: [B: 1, W: 0]');
    });
  });
});
