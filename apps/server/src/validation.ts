import { isPosition } from './engine/board.js'
import type { BoardLayout, CalibrationPlan, PieceTransfer } from './services/calibrationService.js'
import type { DetectedPosition, PieceColor } from './services/gameController.js'
import type { StartMatchRequest } from './types/rig.js'

// Guards for payloads arriving over HTTP and Socket.IO. Each returns null when
// the payload does not have the expected shape.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPieceColor(value: unknown): value is PieceColor {
  return value === 'white' || value === 'black'
}

function isDigit(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 9
}

export function parseStartMatch(value: unknown): StartMatchRequest | null {
  if (value === undefined || value === null) {
    return {}
  }
  if (!isRecord(value)) {
    return null
  }

  const { machineFirst, openingPosition, humanColor } = value
  if (machineFirst !== undefined && typeof machineFirst !== 'boolean') return null
  if (openingPosition !== undefined && !isPosition(openingPosition)) return null
  if (humanColor !== undefined && !isPieceColor(humanColor)) return null

  return { machineFirst, openingPosition, humanColor }
}

// Position is only checked for being an integer; range is the rules engine's call
export function parseObservation(value: unknown): DetectedPosition | null {
  if (!isRecord(value)) {
    return null
  }

  const { position, color, visible } = value
  if (typeof position !== 'number' || !Number.isInteger(position)) return null
  if (!isPieceColor(color)) return null

  if (visible === undefined) {
    return { position, color }
  }

  if (!Array.isArray(visible) || !visible.every(isPosition)) return null
  return { position, color, visible: [...visible] }
}

export function parseMatchId(value: unknown): string | null {
  if (!isRecord(value)) {
    return null
  }
  const { matchId } = value
  return typeof matchId === 'string' && matchId.length > 0 ? matchId : null
}

function parseTransfer(value: unknown): PieceTransfer | null {
  if (!isRecord(value)) return null
  const { from, to } = value
  if (!isDigit(from) || !isPosition(to)) return null
  return { from, to }
}

function parseTransferPair(value: unknown): [PieceTransfer, PieceTransfer] | null {
  if (!Array.isArray(value) || value.length !== 2) return null
  const first = parseTransfer(value[0])
  const second = parseTransfer(value[1])
  return first && second ? [first, second] : null
}

function isLayout(value: unknown): value is BoardLayout {
  return value === 'standard' || value === 'rotated'
}

export function parseCalibrationPlan(value: unknown): CalibrationPlan | null {
  if (!isRecord(value)) {
    return null
  }

  const { kind, from, layout, remap } = value

  if (kind === 'center') {
    return isDigit(from) ? { kind: 'center', from } : null
  }

  if (kind !== 'transfers' || !isLayout(layout)) return null
  if (remap !== undefined && typeof remap !== 'boolean') return null

  const white = parseTransferPair(value.white)
  const black = parseTransferPair(value.black)
  if (!white || !black) return null

  return { kind: 'transfers', layout, remap, white, black }
}
