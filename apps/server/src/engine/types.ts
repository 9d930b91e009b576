// Engine types for the 3x3 rig board. Positions are flat indices: row * 3 + col.
export type Mark = 'human' | 'machine'

export type Cell = Mark | null

export type Board = Cell[] // 9 squares, null = empty

export type GameResult = 'in_progress' | 'human_win' | 'machine_win' | 'draw'

export type RuleError = 'out_of_range' | 'cell_occupied'

export type MoveApplication =
  | { success: true }
  | { success: false; reason: RuleError }

export type CheatOutcome =
  | { type: 'clean' }
  | { type: 'cheat'; from: number; to: number }
  | { type: 'invalid'; reason: RuleError }

export interface MoveRecord {
  mark: Mark
  position: number
  at: Date
}
