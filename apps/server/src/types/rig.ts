import type { GameResult } from '../engine/types.js'
import type { CalibrationPlan } from '../services/calibrationService.js'
import type { PieceColor } from '../services/gameController.js'
import type { MatchView } from '../services/matchService.js'
import type { TransportErrorCode } from '../transport/types.js'

export interface StartMatchRequest {
  machineFirst?: boolean
  openingPosition?: number
  humanColor?: PieceColor
}

export interface ObservationRequest {
  matchId: string
  position: number
  color: PieceColor
  visible?: number[]
}

export interface CalibrationUpdate {
  status: 'ready' | 'sent' | 'complete' | 'failed'
  step?: number
  payload?: string
  remaining: number
}

// Socket event types for the /rig namespace (vision process and operator console)
export interface ServerToClientEvents {
  welcome: (message: string) => void
  matchState: (match: MatchView) => void
  cheatDetected: (data: { matchId: string; from: number; to: number }) => void
  gameResult: (data: { matchId: string; result: GameResult; winningLine: number[] | null }) => void
  observationRejected: (data: { matchId: string; reason: string }) => void
  transportFailure: (data: { matchId: string | null; code: TransportErrorCode; message: string }) => void
  calibrationState: (update: CalibrationUpdate) => void
  error: (message: string) => void
}

export interface ClientToServerEvents {
  startMatch: (request: StartMatchRequest) => void
  observation: (request: ObservationRequest) => void
  startCalibration: (plan: CalibrationPlan) => void
  calibrationStep: () => void
}
