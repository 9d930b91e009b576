import { isPosition } from './board.js'
import type { Board, CheatOutcome, GameResult, Mark, MoveApplication } from './types.js'

// Winning triplets in check order: rows, columns, main diagonal, anti-diagonal
export const WINNING_LINES: readonly (readonly [number, number, number])[] = [
  [0, 1, 2], // Top row
  [3, 4, 5], // Middle row
  [6, 7, 8], // Bottom row
  [0, 3, 6], // Left column
  [1, 4, 7], // Middle column
  [2, 5, 8], // Right column
  [0, 4, 8], // Diagonal top-left to bottom-right
  [2, 4, 6], // Diagonal top-right to bottom-left
]

export function applyMove(board: Board, position: number, mark: Mark): MoveApplication {
  if (!isPosition(position)) {
    return { success: false, reason: 'out_of_range' }
  }

  if (board[position] !== null) {
    return { success: false, reason: 'cell_occupied' }
  }

  board[position] = mark
  return { success: true }
}

export function clearCell(board: Board, position: number): void {
  if (isPosition(position)) {
    board[position] = null
  }
}

export function findWinningLine(board: readonly (Mark | null)[], mark: Mark): number[] | null {
  for (const line of WINNING_LINES) {
    if (line.every(index => board[index] === mark)) {
      return [...line]
    }
  }
  return null
}

export function detectWinner(board: readonly (Mark | null)[], mark: Mark): boolean {
  return findWinningLine(board, mark) !== null
}

export function isFull(board: readonly (Mark | null)[]): boolean {
  return board.every(cell => cell !== null)
}

export function getGameResult(board: readonly (Mark | null)[]): GameResult {
  if (detectWinner(board, 'human')) return 'human_win'
  if (detectWinner(board, 'machine')) return 'machine_win'
  if (isFull(board)) return 'draw'
  return 'in_progress'
}

/**
 * Places a new human piece at `candidate` unless doing so shows that a
 * previously confirmed piece slid there instead of a fresh one being added.
 *
 * Each confirmed piece is located before the placement. After it, a piece
 * whose square is still in `visible` stays put; one that has vanished from
 * `visible` is attributed to the newly seen square. When `visible` is omitted
 * every confirmed piece is assumed to still be in place.
 *
 * On `cheat` or `invalid` the board is left as it was.
 */
export function detectCheat(
  board: Board,
  candidate: number,
  confirmed: ReadonlySet<number>,
  visible?: ReadonlySet<number>
): CheatOutcome {
  const before = new Map<number, number>()
  for (const position of [...confirmed].sort((a, b) => a - b)) {
    if (board[position] === 'human') {
      before.set(position, position)
    }
  }

  const placement = applyMove(board, candidate, 'human')
  if (!placement.success) {
    return { type: 'invalid', reason: placement.reason }
  }

  for (const [piece, index] of before) {
    const current = visible === undefined || visible.has(piece) ? piece : candidate
    if (current !== index) {
      clearCell(board, candidate)
      return { type: 'cheat', from: index, to: current }
    }
  }

  return { type: 'clean' }
}
