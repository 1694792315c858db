/**
 * GoBoard - Core board rules
 *
 * Owns the padded cell array and enforces occupancy, ko and suicide.
 * Captures are resolved in all four directions before the suicide check,
 * so a move that captures is always legal. Ko is a single point and only
 * arises when one stone is captured by a move whose four neighbors were all
 * of the opponent's color.
 */

import {
  fromIndex,
  neighborOffsets,
  playableIndices,
  stride,
  toIndex,
  formatIntersection,
} from './GoCoordinates.js';
import { estimateScore } from './GoScoring.js';
import {
  BoardSize,
  COLUMNS,
  Captures,
  Color,
  DEFAULT_KOMI,
  EMPTY_GLYPH,
  Group,
  Intersection,
  IntersectionState,
  Move,
  PlayResult,
  STONE_GLYPHS,
  oppositeColor,
} from './types.js';

/** Options for loading a position from a text diagram */
export interface DiagramOptions {
  toMove?: Color;
  komi?: number;
  moveNumber?: number;
  ko?: Intersection;
}

/** Plain-object form of a board, JSON-serializable */
export interface GoBoardSnapshot {
  size: BoardSize;
  /** One string per row, highest row first, glyphs X / O / . */
  diagram: string[];
  toMove: Color;
  ko: Intersection | null;
  komi: number;
  captures: Captures;
  moveNumber: number;
  consecutivePasses: number;
  lastMove: Move | null;
}

const GLYPH_TO_STATE: Record<string, IntersectionState> = {
  X: 'b',
  O: 'w',
  [EMPTY_GLYPH]: 'empty',
};

/** Cell codes stored in the padded array */
const CELL_STATES: readonly IntersectionState[] = ['empty', 'b', 'w', 'offboard'];
const EMPTY = 0;
const OFFBOARD = 3;

function cellCode(state: IntersectionState): number {
  return CELL_STATES.indexOf(state);
}

function emptyCells(size: BoardSize): Uint8Array {
  const s = stride(size);
  const cells = new Uint8Array(s * s);
  for (let r = 0; r < s; r++) {
    for (let c = 0; c < s; c++) {
      const border = r === 0 || r === s - 1 || c === 0 || c === s - 1;
      cells[r * s + c] = border ? OFFBOARD : EMPTY;
    }
  }
  return cells;
}

export class GoBoard {
  readonly size: BoardSize;
  private cells: Uint8Array;
  private offsets: [number, number, number, number];
  private _toMove: Color = 'b';
  private _ko: number | null = null;
  private _komi: number = DEFAULT_KOMI;
  private _lastMove: Move | null = null;
  private _captures: Captures = { b: 0, w: 0 };
  private _moveNumber = 0;
  private _consecutivePasses = 0;

  constructor(size: BoardSize = 19) {
    this.size = size;
    this.cells = emptyCells(size);
    this.offsets = neighborOffsets(size);
  }

  /**
   * Load a position from a diagram such as
   * ```
   * ['X.O', ...]   // first string is the highest row
   * ```
   * Whitespace inside rows is ignored.
   * @returns undefined if the diagram is not a square 9, 13 or 19 grid of X / O / .
   */
  static fromDiagram(rows: string[], options: DiagramOptions = {}): GoBoard | undefined {
    const size = rows.length;
    if (size !== 9 && size !== 13 && size !== 19) return undefined;

    const board = new GoBoard(size);
    const s = stride(size);

    for (let r = 0; r < size; r++) {
      const glyphs = rows[r].replace(/\s+/g, '');
      if (glyphs.length !== size) return undefined;
      for (let c = 0; c < size; c++) {
        const state = GLYPH_TO_STATE[glyphs[c]];
        if (state === undefined) return undefined;
        board.cells[(r + 1) * s + c + 1] = cellCode(state);
      }
    }

    if (options.ko) {
      const ko = toIndex(options.ko, size);
      if (ko === undefined || board.cellAt(ko) !== 'empty') return undefined;
      board._ko = ko;
    }

    board._toMove = options.toMove ?? 'b';
    board._komi = options.komi ?? DEFAULT_KOMI;
    board._moveNumber = options.moveNumber ?? 0;
    return board;
  }

  /** Rebuild a board from toJSON() output */
  static fromSnapshot(snapshot: GoBoardSnapshot): GoBoard | undefined {
    const board = GoBoard.fromDiagram(snapshot.diagram, {
      toMove: snapshot.toMove,
      komi: snapshot.komi,
      moveNumber: snapshot.moveNumber,
      ko: snapshot.ko ?? undefined,
    });
    if (!board || board.size !== snapshot.size) return undefined;

    board._captures = { ...snapshot.captures };
    board._consecutivePasses = snapshot.consecutivePasses;
    board._lastMove = snapshot.lastMove;
    return board;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get toMove(): Color {
    return this._toMove;
  }

  /** Current ko point as a board index, or null */
  get ko(): number | null {
    return this._ko;
  }

  get komi(): number {
    return this._komi;
  }

  get lastMove(): Move | null {
    return this._lastMove;
  }

  get captures(): Captures {
    return { ...this._captures };
  }

  get moveNumber(): number {
    return this._moveNumber;
  }

  get consecutivePasses(): number {
    return this._consecutivePasses;
  }

  /** Number of cells in the padded array */
  get cellCount(): number {
    return this.cells.length;
  }

  cellAt(index: number): IntersectionState {
    return CELL_STATES[this.cells[index]] ?? 'offboard';
  }

  stateAt(intersection: Intersection): IntersectionState | undefined {
    const index = toIndex(intersection, this.size);
    return index === undefined ? undefined : this.cellAt(index);
  }

  /** Ko point as an intersection, or null */
  koIntersection(): Intersection | null {
    return this._ko === null ? null : fromIndex(this._ko, this.size) ?? null;
  }

  neighbors(index: number): number[] {
    return this.offsets.map(offset => index + offset);
  }

  forEachStone(callback: (index: number, color: Color) => void): void {
    for (let i = 0; i < this.cells.length; i++) {
      const state = this.cellAt(i);
      if (state === 'b' || state === 'w') callback(i, state);
    }
  }

  isEmptyBoard(): boolean {
    return this.cells.every(code => code === EMPTY || code === OFFBOARD);
  }

  /** Two consecutive passes end the game */
  isGameOver(): boolean {
    return this._consecutivePasses >= 2;
  }

  /** Hand the move to `color` without playing (GTP lets either side move) */
  setToMove(color: Color): void {
    this._toMove = color;
  }

  setKomi(value: number): void {
    this._komi = value;
  }

  // ===========================================================================
  // Copying
  // ===========================================================================

  /** Independent deep copy; no state is shared with this board */
  clone(): GoBoard {
    const copy = new GoBoard(this.size);
    copy.cells = this.cells.slice();
    copy._toMove = this._toMove;
    copy._ko = this._ko;
    copy._komi = this._komi;
    copy._lastMove = this._lastMove ? structuredClone(this._lastMove) : null;
    copy._captures = { ...this._captures };
    copy._moveNumber = this._moveNumber;
    copy._consecutivePasses = this._consecutivePasses;
    return copy;
  }

  /**
   * Same stones, ko point and side to move. Counters, komi and history are
   * not compared.
   */
  samePosition(other: GoBoard): boolean {
    if (this.size !== other.size) return false;
    if (this._toMove !== other._toMove || this._ko !== other._ko) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  /** Reset to an empty board, keeping size and komi */
  clear(): void {
    this.cells = emptyCells(this.size);
    this._toMove = 'b';
    this._ko = null;
    this._lastMove = null;
    this._captures = { b: 0, w: 0 };
    this._moveNumber = 0;
    this._consecutivePasses = 0;
  }

  // ===========================================================================
  // Groups
  // ===========================================================================

  /**
   * Flood fill from `seed` over stones of `color`, collecting the stones and
   * the empty cells next to them. A seed that is empty yields no stones and
   * itself as the only liberty.
   */
  findGroup(seed: number, color: Color): Group {
    const stones: number[] = [];
    const liberties: number[] = [];
    if (seed < 0 || seed >= this.cells.length) return { color, stones, liberties };

    const seen = new Uint8Array(this.cells.length);
    const stack: number[] = [seed];
    seen[seed] = 1;

    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;

      const state = this.cellAt(index);
      if (state === 'empty') {
        liberties.push(index);
        continue;
      }
      if (state !== color) continue;

      stones.push(index);
      for (const offset of this.offsets) {
        const next = index + offset;
        if (seen[next] === 0) {
          seen[next] = 1;
          stack.push(next);
        }
      }
    }

    return { color, stones, liberties };
  }

  /**
   * Liberties of the group of `color` with the fewest liberties, scanning in
   * index order (first found wins ties); empty when `color` has no stones.
   */
  weakestGroup(color: Color): number[] {
    return this.findWeakestGroup(color)?.liberties ?? [];
  }

  findWeakestGroup(color: Color): Group | undefined {
    const seen = new Uint8Array(this.cells.length);
    let weakest: Group | undefined;

    for (let i = 0; i < this.cells.length; i++) {
      if (this.cellAt(i) !== color || seen[i] === 1) continue;

      const group = this.findGroup(i, color);
      for (const stone of group.stones) seen[stone] = 1;

      if (!weakest || group.liberties.length < weakest.liberties.length) {
        weakest = group;
      }
    }

    return weakest;
  }

  /**
   * The single color on all four sides of `index`, ignoring offboard sides.
   * Any empty neighbor or a mix of colors gives undefined.
   */
  diamondAt(index: number): Color | undefined {
    if (this.cellAt(index) === 'offboard') return undefined;

    let diamond: Color | undefined;
    for (const offset of this.offsets) {
      const state = this.cellAt(index + offset);
      if (state === 'empty') return undefined;
      if (state === 'offboard') continue;
      if (diamond !== undefined && diamond !== state) return undefined;
      diamond = state;
    }
    return diamond;
  }

  diamond(intersection: Intersection): Color | undefined {
    const index = toIndex(intersection, this.size);
    return index === undefined ? undefined : this.diamondAt(index);
  }

  // ===========================================================================
  // Playing Moves
  // ===========================================================================

  /**
   * Play a move
   * @returns true if the move was applied; the board is unchanged otherwise
   */
  play(move: Move): boolean {
    return this.tryPlay(move).ok;
  }

  /** Play a move and report why it failed */
  tryPlay(move: Move): PlayResult {
    switch (move.type) {
      case 'pass':
        this._toMove = oppositeColor(this._toMove);
        this._lastMove = { type: 'pass' };
        this._moveNumber++;
        this._consecutivePasses++;
        return { ok: true, captured: 0 };
      case 'resign':
        return { ok: false, reason: 'resign' };
      case 'place': {
        const index = toIndex(move.intersection, this.size);
        if (index === undefined) return { ok: false, reason: 'out_of_bounds' };
        return this.playAt(index, move.color);
      }
    }
  }

  /**
   * Place a stone of `color` at a board index under the full rules.
   * The index must be a playable cell.
   */
  playAt(index: number, color: Color): PlayResult {
    if (this._ko === index) return { ok: false, reason: 'ko' };

    const state = this.cellAt(index);
    if (state === 'offboard') {
      throw new Error(`playAt called with offboard index ${index}`);
    }
    if (state !== 'empty') return { ok: false, reason: 'occupied' };

    this.cells[index] = cellCode(color);

    const opponent = oppositeColor(color);
    let newKo: number | null = null;
    let captured = 0;

    for (const offset of this.offsets) {
      const neighbor = index + offset;
      const group = this.findGroup(neighbor, opponent);
      if (group.stones.length === 0 || group.liberties.length > 0) continue;

      if (group.stones.length === 1) {
        const surrounding = this.diamondAt(index);
        if (surrounding !== undefined && surrounding !== color) {
          newKo = neighbor;
        }
      }

      for (const stone of group.stones) {
        this.cells[stone] = EMPTY;
      }
      this._captures[color] += group.stones.length;
      captured += group.stones.length;
    }

    // Nothing was captured if we get here with no liberties
    if (this.findGroup(index, color).liberties.length === 0) {
      this.cells[index] = EMPTY;
      return { ok: false, reason: 'suicide' };
    }

    const intersection = fromIndex(index, this.size);
    if (!intersection) {
      throw new Error(`No intersection for playable index ${index}`);
    }

    this._ko = newKo;
    this._toMove = opponent;
    this._lastMove = { type: 'place', intersection, color };
    this._moveNumber++;
    this._consecutivePasses = 0;
    return { ok: true, captured };
  }

  /**
   * Put a stone down with no capture, ko or turn handling (position setup)
   * @returns false if the point is off the board or occupied
   */
  placeStone(intersection: Intersection, color: Color): boolean {
    const index = toIndex(intersection, this.size);
    if (index === undefined || this.cellAt(index) !== 'empty') return false;
    this.cells[index] = cellCode(color);
    return true;
  }

  /** Whether `color` could legally play at `index` right now */
  isLegalAt(index: number, color: Color): boolean {
    if (this.cellAt(index) !== 'empty' || this._ko === index) return false;
    // A stone with an empty neighbor always keeps a liberty
    if (this.offsets.some(offset => this.cells[index + offset] === EMPTY)) return true;
    return this.clone().playAt(index, color).ok;
  }

  /** All legal placements for `color` */
  legalPlacements(color: Color): number[] {
    return playableIndices(this.size).filter(index => this.isLegalAt(index, color));
  }

  // ===========================================================================
  // Scoring & Rendering
  // ===========================================================================

  /** Area estimate; positive favors Black */
  estimateScore(): number {
    return estimateScore(this);
  }

  /** Stones as X / O / . rows, highest row first */
  toDiagram(): string[] {
    const s = stride(this.size);
    const rows: string[] = [];
    for (let r = 1; r <= this.size; r++) {
      let row = '';
      for (let c = 1; c <= this.size; c++) {
        const state = this.cellAt(r * s + c);
        row += state === 'b' || state === 'w' ? STONE_GLYPHS[state] : EMPTY_GLYPH;
      }
      rows.push(row);
    }
    return rows;
  }

  /**
   * Text grid (rows from `size` down to 1 with right-aligned labels, then a
   * column legend) followed by the status lines
   */
  render(): string {
    return `${this.renderGrid()}\n${this.renderStatus()}`;
  }

  renderGrid(): string {
    const lines = this.toDiagram().map((row, i) => {
      const label = String(this.size - i).padStart(2, ' ');
      return `${label} ${row.split('').join(' ')}`;
    });
    lines.push(`   ${COLUMNS.slice(0, this.size).join(' ')}`);
    return lines.join('\n');
  }

  /** Komi, ko and capture lines shown under the grid */
  renderStatus(): string {
    const ko = this.koIntersection();
    return [
      `Komi:     ${this._komi}`,
      `Ko:       ${ko ? formatIntersection(ko) : 'None'}`,
      `Captures: [B: ${this._captures.b}, W: ${this._captures.w}]`,
    ].join('\n');
  }

  toJSON(): GoBoardSnapshot {
    return {
      size: this.size,
      diagram: this.toDiagram(),
      toMove: this._toMove,
      ko: this.koIntersection(),
      komi: this._komi,
      captures: { ...this._captures },
      moveNumber: this._moveNumber,
      consecutivePasses: this._consecutivePasses,
      lastMove: this._lastMove ? structuredClone(this._lastMove) : null,
    };
  }
}

/** Empty board of the given size, Black to move */
export function createBoard(size: BoardSize = 19): GoBoard {
  return new GoBoard(size);
}
