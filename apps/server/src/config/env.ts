import { isPosition } from '../engine/board.js'
import type { PieceColor } from '../services/gameController.js'

export interface RigConfig {
  nodeEnv: string
  port: number
  host: string
  machineFirst: boolean
  openingPosition?: number
  humanColor: PieceColor
  actuatorAckTimeoutMs: number
}

function parseColor(value: string | undefined): PieceColor {
  if (value === undefined || value === '' || value === 'white') return 'white'
  if (value === 'black') return 'black'
  throw new Error(`HUMAN_COLOR must be "white" or "black", got "${value}"`)
}

function parseOpening(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const position = Number(value)
  if (!isPosition(position)) {
    throw new Error(`OPENING_POSITION must be a square 0-8, got "${value}"`)
  }
  return position
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RigConfig {
  const nodeEnv = env.NODE_ENV ?? 'development'

  return {
    nodeEnv,
    port: nodeEnv === 'development' ? 8890 : parseInt(env.PORT || '9001', 10),
    host: env.HOST || '0.0.0.0',
    machineFirst: env.MACHINE_FIRST === 'true',
    openingPosition: parseOpening(env.OPENING_POSITION),
    humanColor: parseColor(env.HUMAN_COLOR),
    actuatorAckTimeoutMs: parseInt(env.ACTUATOR_ACK_TIMEOUT_MS || '2000', 10),
  }
}
