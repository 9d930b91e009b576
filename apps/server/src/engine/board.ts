import type { Board, Cell } from './types.js'

export const BOARD_SIZE = 3
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE

const SYMBOLS: Record<string, string> = {
  human: 'X',
  machine: 'O',
  empty: '.',
}

export function createBoard(): Board {
  return Array<Cell>(CELL_COUNT).fill(null)
}

export function isPosition(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < CELL_COUNT
}

export function toRowCol(position: number): [row: number, col: number] {
  return [Math.floor(position / BOARD_SIZE), position % BOARD_SIZE]
}

export function toPosition(row: number, col: number): number {
  return row * BOARD_SIZE + col
}

// Ascending index order; the search relies on this for its tie-break.
export function emptyPositions(board: readonly Cell[]): number[] {
  const positions: number[] = []
  for (let position = 0; position < CELL_COUNT; position++) {
    if (board[position] === null) {
      positions.push(position)
    }
  }
  return positions
}

/**
 * Text picture of the board for log lines, one row per line:
 *
 *   0: X . .
 *   1: . O .
 *   2: . . X
 */
export function renderBoard(board: readonly Cell[]): string {
  const rows: string[] = []
  for (let row = 0; row < BOARD_SIZE; row++) {
    const cells: string[] = []
    for (let col = 0; col < BOARD_SIZE; col++) {
      cells.push(SYMBOLS[board[toPosition(row, col)] ?? 'empty'])
    }
    rows.push(`${row}: ${cells.join(' ')}`)
  }
  return rows.join('\n')
}
