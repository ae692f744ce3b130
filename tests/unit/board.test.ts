import {
  boardFromString,
  boardToString,
  cloneBoard,
  countEmpty,
  countPieces,
  createEmptyBoard,
  createInitialBoard,
  createPosition,
  isCorner,
  isEdge,
  isInBounds,
  tryCreatePosition,
} from '../../src/shared/engine/board';
import { InvalidPositionError } from '../../src/shared/errors/GameDomainErrors';

describe('board', () => {
  describe('positions', () => {
    it('accepts every coordinate on the grid', () => {
      expect(createPosition(0, 0)).toEqual({ row: 0, col: 0 });
      expect(createPosition(7, 7)).toEqual({ row: 7, col: 7 });
    });

    it.each([
      [-1, 0],
      [0, -1],
      [8, 0],
      [0, 8],
      [1.5, 2],
    ])('rejects (%p, %p)', (row, col) => {
      expect(() => createPosition(row, col)).toThrow(InvalidPositionError);
      expect(tryCreatePosition(row, col)).toBeNull();
      expect(isInBounds(row, col)).toBe(false);
    });

    it('reports the offending coordinates', () => {
      expect(() => createPosition(8, 3)).toThrow('Invalid position: (8, 3) is outside the board');
    });

    it('classifies corners and edges', () => {
      expect(isCorner({ row: 0, col: 7 })).toBe(true);
      expect(isCorner({ row: 0, col: 3 })).toBe(false);
      expect(isEdge({ row: 0, col: 3 })).toBe(true);
      expect(isEdge({ row: 5, col: 7 })).toBe(true);
      expect(isEdge({ row: 3, col: 3 })).toBe(false);
    });
  });

  describe('initial board', () => {
    it('places the four centre discs', () => {
      const board = createInitialBoard();
      expect(board[3][3]).toBe('white');
      expect(board[3][4]).toBe('black');
      expect(board[4][3]).toBe('black');
      expect(board[4][4]).toBe('white');
      expect(countPieces(board)).toEqual({ black: 2, white: 2 });
      expect(countEmpty(board)).toBe(60);
    });

    it('renders as text', () => {
      expect(boardToString(createInitialBoard())).toBe(
        ['........', '........', '........', '...WB...', '...BW...', '........', '........', '........'].join(
          '\n'
        )
      );
    });
  });

  describe('text round trip', () => {
    it('parses indented text', () => {
      const board = boardFromString(`
        B.......
        ........
        ........
        ...WB...
        ...BW...
        ........
        ........
        .......W
      `);
      expect(board[0][0]).toBe('black');
      expect(board[7][7]).toBe('white');
      expect(countPieces(board)).toEqual({ black: 3, white: 3 });
    });

    it('rejects malformed text', () => {
      expect(() => boardFromString('B.W')).toThrow('Board text must be 8 lines of 8 characters');
    });
  });

  it('clones without sharing rows', () => {
    const board = createEmptyBoard();
    const copy = cloneBoard(board);
    copy[0][0] = 'black';
    expect(board[0][0]).toBe('empty');
  });
});
