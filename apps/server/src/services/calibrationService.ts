import { Mutex } from 'async-mutex'
import { CELL_COUNT } from '../engine/board.js'
import { encodeCommand, toPayload, type Command } from '../protocol/commands.js'
import { formatFrameHex } from '../protocol/frame.js'
import { mapRotatedPosition } from '../protocol/rotation.js'
import type { Transport, TransportError } from '../transport/types.js'

export type BoardLayout = 'standard' | 'rotated'

export interface PieceTransfer {
  from: number // reserve slot or square the arm picks up from
  to: number
}

export type CalibrationPlan =
  | {
      kind: 'transfers'
      layout: BoardLayout
      remap?: boolean // rotated layout only: renumber squares to the rotated board
      white: [PieceTransfer, PieceTransfer]
      black: [PieceTransfer, PieceTransfer]
    }
  | { kind: 'center'; from: number }

export const CENTER_POSITION = Math.floor(CELL_COUNT / 2)

export type CalibrationStepResult =
  | { type: 'sent'; step: number; payload: string; remaining: number }
  | { type: 'complete' }
  | { type: 'transport_failure'; step: number; error: TransportError }

function transferCommand(kind: 'white' | 'black', layout: BoardLayout, transfer: PieceTransfer): Command {
  if (layout === 'rotated') {
    return kind === 'white'
      ? { type: 'calibration_a', from: transfer.from, to: transfer.to }
      : { type: 'calibration_b', from: transfer.from, to: transfer.to }
  }
  return kind === 'white'
    ? { type: 'human_move', from: transfer.from, to: transfer.to }
    : { type: 'machine_move', sequence: transfer.from, target: transfer.to }
}

/**
 * Expands a plan into the commands the arm executes, in order: both white
 * transfers, then both black ones. A centre placement is a single black
 * transfer onto square 4.
 */
export function buildCalibrationSequence(plan: CalibrationPlan): Command[] {
  if (plan.kind === 'center') {
    return [{ type: 'machine_move', sequence: plan.from, target: CENTER_POSITION }]
  }

  const remap = plan.layout === 'rotated' && plan.remap === true
  const place = (transfer: PieceTransfer): PieceTransfer =>
    remap ? { from: mapRotatedPosition(transfer.from), to: mapRotatedPosition(transfer.to) } : transfer

  return [
    ...plan.white.map(transfer => transferCommand('white', plan.layout, place(transfer))),
    ...plan.black.map(transfer => transferCommand('black', plan.layout, place(transfer))),
  ]
}

// Steps through a plan one command per operator confirmation
export class CalibrationSession {
  private readonly commands: Command[]
  private nextIndex = 0
  private readonly mutex = new Mutex()

  constructor(
    private readonly transport: Transport,
    plan: CalibrationPlan
  ) {
    this.commands = buildCalibrationSequence(plan)
  }

  get remaining(): number {
    return this.commands.length - this.nextIndex
  }

  get total(): number {
    return this.commands.length
  }

  // Steps may be requested over HTTP and the socket at once; one frame at a time
  async next(): Promise<CalibrationStepResult> {
    return await this.mutex.runExclusive(async (): Promise<CalibrationStepResult> => {
      if (this.nextIndex >= this.commands.length) {
        return { type: 'complete' }
      }

      const step = this.nextIndex + 1
      const command = this.commands[this.nextIndex]
      const frame = encodeCommand(command)
      const sent = await this.transport.send(frame)

      if (!sent.ok) {
        return { type: 'transport_failure', step, error: sent.error }
      }

      this.nextIndex++
      console.log(JSON.stringify({
        evt: 'calibration.step',
        step,
        total: this.commands.length,
        payload: toPayload(command),
        frame: formatFrameHex(frame),
      }))

      return { type: 'sent', step, payload: toPayload(command), remaining: this.remaining }
    })
  }
}
