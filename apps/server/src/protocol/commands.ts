import { encodeFrame } from './frame.js'

export type Command =
  | { type: 'human_move'; from: number; to: number }
  | { type: 'machine_move'; sequence: number; target: number } // sequence doubles as the arm's reserve slot
  | { type: 'cheat_report'; from: number; to: number }
  | { type: 'calibration_a'; from: number; to: number }
  | { type: 'calibration_b'; from: number; to: number }

export type CommandType = Command['type']

export const OPCODES = {
  human_move: 1,
  machine_move: 2,
  cheat_report: 3,
  calibration_a: 4,
  calibration_b: 5,
} as const satisfies Record<CommandType, number>

const PAYLOAD_PATTERN = /^([1-5])(\d)(\d)$/

function commandArgs(command: Command): [number, number] {
  switch (command.type) {
    case 'machine_move':
      return [command.sequence, command.target]
    case 'human_move':
    case 'cheat_report':
    case 'calibration_a':
    case 'calibration_b':
      return [command.from, command.to]
  }
}

// No range checks: picking meaningful arguments is the caller's job
export function toPayload(command: Command): string {
  const [first, second] = commandArgs(command)
  return `${OPCODES[command.type]}${first}${second}`
}

export function encodeCommand(command: Command): Buffer {
  return encodeFrame(toPayload(command))
}

export function parsePayload(payload: string): Command | null {
  const match = PAYLOAD_PATTERN.exec(payload)
  if (!match) {
    return null
  }

  const first = Number(match[2])
  const second = Number(match[3])

  switch (Number(match[1])) {
    case OPCODES.human_move:
      return { type: 'human_move', from: first, to: second }
    case OPCODES.machine_move:
      return { type: 'machine_move', sequence: first, target: second }
    case OPCODES.cheat_report:
      return { type: 'cheat_report', from: first, to: second }
    case OPCODES.calibration_a:
      return { type: 'calibration_a', from: first, to: second }
    case OPCODES.calibration_b:
      return { type: 'calibration_b', from: first, to: second }
    default:
      return null
  }
}
