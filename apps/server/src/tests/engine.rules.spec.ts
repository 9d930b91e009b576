import { describe, it, expect } from 'vitest'
import { createBoard, emptyPositions, renderBoard, toPosition, toRowCol } from '../engine/board.js'
import {
  WINNING_LINES,
  applyMove,
  clearCell,
  detectCheat,
  detectWinner,
  findWinningLine,
  getGameResult,
  isFull,
} from '../engine/rulesEngine.js'
import type { Board } from '../engine/types.js'
import { boardFrom } from './utils/boards.js'

const SAMPLE_BOARDS: Board[] = [
  createBoard(),
  boardFrom('X.. .O. ...'),
  boardFrom('XO. .OX ..X'),
  boardFrom('XOX OX. O..'),
  boardFrom('XOX XOO OX.'),
]

describe('Board', () => {
  it('should create an empty 3x3 board', () => {
    const board = createBoard()

    expect(board).toHaveLength(9)
    expect(board.every(cell => cell === null)).toBe(true)
  })

  it('should convert between flat positions and row/col', () => {
    expect(toRowCol(0)).toEqual([0, 0])
    expect(toRowCol(5)).toEqual([1, 2])
    expect(toRowCol(7)).toEqual([2, 1])
    expect(toPosition(2, 0)).toBe(6)
    expect(toPosition(1, 1)).toBe(4)
  })

  it('should list empty positions in ascending order', () => {
    expect(emptyPositions(boardFrom('X.. .O. ..X'))).toEqual([1, 2, 3, 5, 6, 7])
  })

  it('should render the board one row per line', () => {
    expect(renderBoard(boardFrom('X.. .O. ..X'))).toBe('0: X . .\n1: . O .\n2: . . X')
  })
})

describe('Rules Engine', () => {
  describe('applyMove', () => {
    it('should mark exactly one empty cell', () => {
      const board = createBoard()

      const result = applyMove(board, 4, 'human')

      expect(result).toEqual({ success: true })
      expect(board).toEqual([null, null, null, null, 'human', null, null, null, null])
    })

    it('should reject positions outside 0-8 without touching the board', () => {
      const board = boardFrom('X.. ... ...')
      const before = [...board]

      expect(applyMove(board, -1, 'machine')).toEqual({ success: false, reason: 'out_of_range' })
      expect(applyMove(board, 9, 'machine')).toEqual({ success: false, reason: 'out_of_range' })
      expect(applyMove(board, 2.5, 'machine')).toEqual({ success: false, reason: 'out_of_range' })
      expect(board).toEqual(before)
    })

    it('should reject occupied cells without touching the board', () => {
      const board = boardFrom('X.. .O. ...')
      const before = [...board]

      expect(applyMove(board, 0, 'machine')).toEqual({ success: false, reason: 'cell_occupied' })
      expect(applyMove(board, 4, 'human')).toEqual({ success: false, reason: 'cell_occupied' })
      expect(board).toEqual(before)
    })

    it('should restore the exact prior board when a move is cleared', () => {
      for (const sample of SAMPLE_BOARDS) {
        for (const position of emptyPositions(sample)) {
          const board = [...sample]

          expect(applyMove(board, position, 'machine').success).toBe(true)
          clearCell(board, position)

          expect(board).toEqual(sample)
        }
      }
    })
  })

  describe('detectWinner', () => {
    it('should detect every one of the eight winning lines', () => {
      expect(WINNING_LINES).toHaveLength(8)

      for (const line of WINNING_LINES) {
        const board = createBoard()
        for (const index of line) {
          board[index] = 'human'
        }

        expect(detectWinner(board, 'human')).toBe(true)
        expect(detectWinner(board, 'machine')).toBe(false)
        expect(findWinningLine(board, 'human')).toEqual([...line])
      }
    })

    it('should not report a winner without three in a line', () => {
      const boards = [
        createBoard(),
        boardFrom('XX. .O. ..O'),
        boardFrom('XOX XOO OXX'),
        boardFrom('X.X .O. O.X'),
      ]

      for (const board of boards) {
        expect(detectWinner(board, 'human')).toBe(false)
        expect(detectWinner(board, 'machine')).toBe(false)
      }
    })

    it('should check rows before columns and diagonals', () => {
      // Top row, left column and main diagonal all belong to the human
      const board = boardFrom('XXX XO. X.X')

      expect(findWinningLine(board, 'human')).toEqual([0, 1, 2])
    })

    it('should find the anti-diagonal', () => {
      expect(findWinningLine(boardFrom('XXO XO. O..'), 'machine')).toEqual([2, 4, 6])
    })
  })

  describe('isFull', () => {
    it('should only be true when no cell is empty', () => {
      expect(isFull(createBoard())).toBe(false)
      expect(isFull(boardFrom('XOX XOO OX.'))).toBe(false)
      expect(isFull(boardFrom('XOX XOO OXX'))).toBe(true)

      for (const board of SAMPLE_BOARDS) {
        expect(isFull(board)).toBe(!board.includes(null))
      }
    })
  })

  describe('getGameResult', () => {
    it('should derive the result from the board alone', () => {
      expect(getGameResult(createBoard())).toBe('in_progress')
      expect(getGameResult(boardFrom('XXX OO. ...'))).toBe('human_win')
      expect(getGameResult(boardFrom('XX. OOO X..'))).toBe('machine_win')
      expect(getGameResult(boardFrom('XOX XOO OXX'))).toBe('draw')
    })
  })

  describe('detectCheat', () => {
    it('should report a confirmed piece that slid to the new square and revert the board', () => {
      const board = boardFrom('X.. ... ...')

      const outcome = detectCheat(board, 4, new Set([0]), new Set([4]))

      expect(outcome).toEqual({ type: 'cheat', from: 0, to: 4 })
      expect(board[0]).toBe('human')
      expect(board[4]).toBeNull()
    })

    it('should commit a new piece when every confirmed piece is still seen', () => {
      const board = boardFrom('X.. .O. ...')

      const outcome = detectCheat(board, 8, new Set([0]), new Set([0, 8]))

      expect(outcome).toEqual({ type: 'clean' })
      expect(board).toEqual(boardFrom('X.. .O. ..X'))
    })

    it('should assume confirmed pieces stay put when no visibility is given', () => {
      const board = boardFrom('X.. .O. ...')

      expect(detectCheat(board, 2, new Set([0]))).toEqual({ type: 'clean' })
      expect(board[2]).toBe('human')
    })

    it('should accept a legal move onto a higher square than every confirmed piece', () => {
      const board = boardFrom('X.. ... ...')

      expect(detectCheat(board, 4, new Set([0]))).toEqual({ type: 'clean' })
      expect(detectCheat(board, 8, new Set([0]), new Set([0, 4, 8]))).toEqual({ type: 'clean' })
      expect(board).toEqual(boardFrom('X.. .X. ..X'))
    })

    it('should name the first vanished piece when several are confirmed', () => {
      const board = boardFrom('X.X .O. O..')

      const outcome = detectCheat(board, 5, new Set([0, 2]), new Set([2, 5]))

      expect(outcome).toEqual({ type: 'cheat', from: 0, to: 5 })
      expect(board).toEqual(boardFrom('X.X .O. O..'))
    })

    it('should report rule errors for unplayable squares', () => {
      const board = boardFrom('X.. .O. ...')
      const before = [...board]

      expect(detectCheat(board, 4, new Set([0]))).toEqual({ type: 'invalid', reason: 'cell_occupied' })
      expect(detectCheat(board, 9, new Set([0]))).toEqual({ type: 'invalid', reason: 'out_of_range' })
      expect(board).toEqual(before)
    })
  })
})
