import { createBoard, isPosition, renderBoard } from '../engine/board.js'
import { applyMove, detectCheat, findWinningLine, getGameResult } from '../engine/rulesEngine.js'
import { bestMachineMove } from '../engine/searchEngine.js'
import type { Board, Cell, GameResult, MoveRecord, RuleError } from '../engine/types.js'
import { encodeCommand, type Command } from '../protocol/commands.js'
import type { Transport, TransportError } from '../transport/types.js'

export type PieceColor = 'white' | 'black'

export type ControllerState = 'awaiting_human' | 'machine_turn' | 'game_over'

// What the vision collaborator reports for one camera pass
export interface DetectedPosition {
  position: number
  color: PieceColor
  visible?: number[] // every human-coloured square seen in the same pass
}

export interface GameControllerOptions {
  machineFirst?: boolean
  openingPosition?: number
  humanColor?: PieceColor
}

export type IgnoreReason = 'match_finished' | 'not_awaiting_human' | 'machine_piece' | 'already_confirmed'

export type ObservationOutcome =
  | { type: 'idle' }
  | { type: 'ignored'; reason: IgnoreReason }
  | { type: 'rejected'; reason: RuleError }
  | { type: 'cheat'; from: number; to: number }
  | { type: 'moved'; humanMove: number | null; machineMove: number | null; result: GameResult }
  | { type: 'transport_failure'; error: TransportError; command: Command; result: GameResult }

export interface ControllerSnapshot {
  state: ControllerState
  board: Cell[]
  result: GameResult
  winningLine: number[] | null
  confirmedPositions: number[]
  machineMoveCount: number
  moves: MoveRecord[]
}

/**
 * Runs one match on the physical board: validates what the camera reports,
 * answers with the search engine's move and hands every resulting command to
 * the transport. One instance per match; nothing carries over to the next.
 */
export class GameController {
  private readonly board: Board = createBoard()
  private readonly confirmed = new Set<number>()
  private readonly moves: MoveRecord[] = []
  private readonly humanColor: PieceColor
  private readonly openingPosition?: number
  private state: ControllerState
  private machineMoveCount = 0

  constructor(
    private readonly transport: Transport,
    options: GameControllerOptions = {}
  ) {
    if (options.openingPosition !== undefined && !isPosition(options.openingPosition)) {
      throw new RangeError(`Opening position must be 0-8, got ${options.openingPosition}`)
    }

    this.humanColor = options.humanColor ?? 'white'
    this.openingPosition = options.machineFirst ? options.openingPosition : undefined
    this.state = options.machineFirst ? 'machine_turn' : 'awaiting_human'
  }

  getState(): ControllerState {
    return this.state
  }

  getResult(): GameResult {
    return getGameResult(this.board)
  }

  getSnapshot(): ControllerSnapshot {
    return {
      state: this.state,
      board: [...this.board],
      result: this.getResult(),
      winningLine: findWinningLine(this.board, 'human') ?? findWinningLine(this.board, 'machine'),
      confirmedPositions: [...this.confirmed].sort((a, b) => a - b),
      machineMoveCount: this.machineMoveCount,
      moves: this.moves.map(move => ({ ...move })),
    }
  }

  renderBoard(): string {
    return renderBoard(this.board)
  }

  // Plays the opening when the machine moves first; otherwise nothing to do yet.
  async start(): Promise<ObservationOutcome> {
    if (this.state !== 'machine_turn') {
      return { type: 'idle' }
    }
    return this.playMachineTurn(null)
  }

  async handleObservation(observation: DetectedPosition | null): Promise<ObservationOutcome> {
    if (this.state === 'game_over') {
      return { type: 'ignored', reason: 'match_finished' }
    }

    if (this.state !== 'awaiting_human') {
      return { type: 'ignored', reason: 'not_awaiting_human' }
    }

    if (observation === null) {
      return { type: 'idle' }
    }

    if (observation.color !== this.humanColor) {
      return { type: 'ignored', reason: 'machine_piece' }
    }

    const { position } = observation

    // The camera keeps reporting pieces it has already seen
    if (this.confirmed.has(position)) {
      return { type: 'ignored', reason: 'already_confirmed' }
    }

    const visible = observation.visible ? new Set(observation.visible) : undefined
    const outcome = detectCheat(this.board, position, this.confirmed, visible)

    if (outcome.type === 'invalid') {
      return { type: 'rejected', reason: outcome.reason }
    }

    if (outcome.type === 'cheat') {
      const command: Command = { type: 'cheat_report', from: outcome.from, to: outcome.to }
      const sent = await this.transport.send(encodeCommand(command))
      if (!sent.ok) {
        return { type: 'transport_failure', error: sent.error, command, result: this.getResult() }
      }
      return { type: 'cheat', from: outcome.from, to: outcome.to }
    }

    this.confirmed.add(position)
    this.moves.push({ mark: 'human', position, at: new Date() })

    const result = this.getResult()
    if (result !== 'in_progress') {
      this.state = 'game_over'
      return { type: 'moved', humanMove: position, machineMove: null, result }
    }

    this.state = 'machine_turn'
    return this.playMachineTurn(position)
  }

  private async playMachineTurn(humanMove: number | null): Promise<ObservationOutcome> {
    const fixedFirstMove = this.machineMoveCount === 0 ? this.openingPosition : undefined
    const position = bestMachineMove(this.board, { fixedFirstMove })

    // Win/draw checks run before every machine turn, so an empty-handed search is a bug
    if (position === null) {
      throw new Error(`Search found no move on a board still in progress:\n${renderBoard(this.board)}`)
    }

    const placement = applyMove(this.board, position, 'machine')
    if (!placement.success) {
      throw new Error(`Search chose an unplayable square ${position}: ${placement.reason}`)
    }

    this.machineMoveCount++
    this.moves.push({ mark: 'machine', position, at: new Date() })

    const result = this.getResult()
    this.state = result === 'in_progress' ? 'awaiting_human' : 'game_over'

    const command: Command = { type: 'machine_move', sequence: this.machineMoveCount, target: position }
    const sent = await this.transport.send(encodeCommand(command))
    if (!sent.ok) {
      return { type: 'transport_failure', error: sent.error, command, result }
    }

    return { type: 'moved', humanMove, machineMove: position, result }
  }
}
