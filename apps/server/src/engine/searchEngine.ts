import { emptyPositions } from './board.js'
import { detectWinner, isFull } from './rulesEngine.js'
import type { Board } from './types.js'

export interface SearchOptions {
  // Forces the returned move (used for the machine's opening when it plays first)
  fixedFirstMove?: number
}

export interface MoveScore {
  position: number
  score: number
}

// Exhaustive minimax, terminal-only scoring: +1 machine win, -1 human win, 0 draw.
// The board is mutated and restored in place; callers get it back unchanged.
export function minimax(board: Board, machineToMove: boolean): number {
  if (detectWinner(board, 'machine')) return 1
  if (detectWinner(board, 'human')) return -1
  if (isFull(board)) return 0

  let bestScore = machineToMove ? -Infinity : Infinity

  for (const position of emptyPositions(board)) {
    board[position] = machineToMove ? 'machine' : 'human'
    const score = minimax(board, !machineToMove)
    board[position] = null

    bestScore = machineToMove ? Math.max(score, bestScore) : Math.min(score, bestScore)
  }

  return bestScore
}

export function scoreMoves(board: Board): MoveScore[] {
  return emptyPositions(board).map(position => {
    board[position] = 'machine'
    const score = minimax(board, false)
    board[position] = null
    return { position, score }
  })
}

export function bestMachineMove(board: Board, options: SearchOptions = {}): number | null {
  const { fixedFirstMove } = options
  if (fixedFirstMove !== undefined && board[fixedFirstMove] === null) {
    return fixedFirstMove
  }

  let bestScore = -Infinity
  let bestPosition: number | null = null

  for (const { position, score } of scoreMoves(board)) {
    // Strictly greater: ties keep the lowest index
    if (score > bestScore) {
      bestScore = score
      bestPosition = position
    }
  }

  return bestPosition
}
