import { Mutex } from 'async-mutex'
import { v4 as uuidv4 } from 'uuid'
import { formatFrameHex } from '../protocol/frame.js'
import { encodeCommand } from '../protocol/commands.js'
import type { GameResult } from '../engine/types.js'
import type { Transport } from '../transport/types.js'
import {
  GameController,
  type ControllerSnapshot,
  type DetectedPosition,
  type GameControllerOptions,
  type ObservationOutcome,
} from './gameController.js'

export type MatchStatus = 'active' | 'finished' | 'halted' | 'abandoned'

export interface RigMatch {
  id: string
  status: MatchStatus
  machineFirst: boolean
  controller: GameController
  cheatCount: number
  startedAt: Date
  finishedAt?: Date
}

export interface MatchView extends ControllerSnapshot {
  matchId: string
  status: MatchStatus
  machineFirst: boolean
  cheatCount: number
  startedAt: Date
  finishedAt?: Date
}

export type SubmitResult =
  | { success: true; outcome: ObservationOutcome; match: MatchView }
  | { success: false; reason: 'match_not_found' | 'match_halted' | 'match_closed' }

export interface CreateMatchResult {
  match: MatchView
  opening: ObservationOutcome
}

// Closed matches kept around for GET /matches/:matchId
export const DEFAULT_RETAINED_MATCHES = 20

/**
 * Owns the rig's matches. There is one physical board, so starting a match
 * abandons whichever one is still active, once its in-flight observation has
 * finished. Observations for a match are processed one at a time.
 */
export class MatchService {
  private matches = new Map<string, RigMatch>()
  private matchMutexes = new Map<string, Mutex>()
  private creationMutex = new Mutex()
  private activeMatchId: string | null = null

  constructor(
    private readonly transport: Transport,
    private readonly defaults: GameControllerOptions = {},
    private readonly retainedMatches = DEFAULT_RETAINED_MATCHES
  ) {}

  async createMatch(options: GameControllerOptions = {}): Promise<CreateMatchResult> {
    return await this.creationMutex.runExclusive(() => this.startMatch(options))
  }

  private async startMatch(options: GameControllerOptions): Promise<CreateMatchResult> {
    const previousId = this.activeMatchId
    if (previousId) {
      const previousMutex = this.matchMutexes.get(previousId)
      if (previousMutex) {
        await previousMutex.runExclusive(() => this.abandonMatch(previousId))
      } else {
        this.abandonMatch(previousId)
      }
    }

    const settings: GameControllerOptions = { ...this.defaults, ...options }
    const controller = new GameController(this.transport, settings)
    const matchId = `match_${Date.now()}_${uuidv4()}`

    const match: RigMatch = {
      id: matchId,
      status: 'active',
      machineFirst: settings.machineFirst ?? false,
      controller,
      cheatCount: 0,
      startedAt: new Date(),
    }

    const mutex = new Mutex()
    this.matches.set(matchId, match)
    this.matchMutexes.set(matchId, mutex)
    this.activeMatchId = matchId

    console.log(JSON.stringify({
      evt: 'match.init',
      matchId,
      machineFirst: match.machineFirst,
      openingPosition: settings.openingPosition ?? null,
      humanColor: settings.humanColor ?? 'white',
      state: controller.getState(),
    }))

    const opening = await mutex.runExclusive(async () => {
      const outcome = await controller.start()
      this.applyOutcome(match, outcome)
      return outcome
    })

    return { match: this.toView(match), opening }
  }

  async submitObservation(matchId: string, observation: DetectedPosition | null): Promise<SubmitResult> {
    const match = this.matches.get(matchId)
    const mutex = this.matchMutexes.get(matchId)
    if (!match || !mutex) {
      return { success: false, reason: 'match_not_found' }
    }

    return await mutex.runExclusive(async (): Promise<SubmitResult> => {
      if (match.status === 'halted') {
        return { success: false, reason: 'match_halted' }
      }

      if (match.status === 'abandoned') {
        return { success: false, reason: 'match_closed' }
      }

      const outcome = await match.controller.handleObservation(observation)
      this.applyOutcome(match, outcome, observation)

      return { success: true, outcome, match: this.toView(match) }
    })
  }

  private applyOutcome(match: RigMatch, outcome: ObservationOutcome, observation?: DetectedPosition | null): void {
    switch (outcome.type) {
      case 'idle':
        return

      case 'ignored':
      case 'rejected':
        this.logDecision({
          evt: 'observation',
          matchId: match.id,
          position: observation?.position ?? null,
          decision: outcome.type,
          reason: outcome.reason,
        })
        return

      case 'cheat':
        match.cheatCount++
        this.logDecision({
          evt: 'cheat',
          matchId: match.id,
          position: observation?.position ?? null,
          decision: 'cheat',
          from: outcome.from,
          to: outcome.to,
        })
        return

      case 'moved':
        this.logDecision({
          evt: 'move',
          matchId: match.id,
          position: outcome.humanMove,
          decision: 'accepted',
          machineMove: outcome.machineMove,
          result: outcome.result,
        })
        this.recordResult(match, outcome.result)
        return

      case 'transport_failure':
        match.status = 'halted'
        match.finishedAt = new Date()
        if (this.activeMatchId === match.id) {
          this.activeMatchId = null
        }
        this.pruneClosedMatches()
        console.error(JSON.stringify({
          evt: 'transport.failure',
          matchId: match.id,
          code: outcome.error.code,
          message: outcome.error.message,
          frame: formatFrameHex(encodeCommand(outcome.command)),
          result: outcome.result,
        }))
        return
    }
  }

  private recordResult(match: RigMatch, result: GameResult): void {
    if (result !== 'in_progress') {
      match.status = 'finished'
      match.finishedAt = new Date()
      if (this.activeMatchId === match.id) {
        this.activeMatchId = null
      }
      console.log(JSON.stringify({
        evt: 'match.result',
        matchId: match.id,
        result,
        board: match.controller.renderBoard(),
      }))
      this.pruneClosedMatches()
    }
  }

  private logDecision(params: {
    evt: 'observation' | 'cheat' | 'move'
    matchId: string
    position: number | null
    decision: string
    reason?: string
    from?: number
    to?: number
    machineMove?: number | null
    result?: string
  }): void {
    console.log(JSON.stringify({
      ...params,
      timestamp: new Date().toISOString(),
    }))
  }

  private abandonMatch(matchId: string): void {
    const match = this.matches.get(matchId)
    if (match && match.status === 'active') {
      match.status = 'abandoned'
      match.finishedAt = new Date()
      console.log(JSON.stringify({ evt: 'match.abandoned', matchId }))
    }
    if (this.activeMatchId === matchId) {
      this.activeMatchId = null
    }
    this.pruneClosedMatches()
  }

  // Drops the oldest closed matches beyond the retention limit; Map order is creation order
  private pruneClosedMatches(): void {
    const closed = [...this.matches.values()].filter(match => match.status !== 'active')
    const excess = closed.length - this.retainedMatches
    for (const match of closed.slice(0, Math.max(0, excess))) {
      this.removeMatch(match.id)
    }
  }

  private removeMatch(matchId: string): void {
    this.matches.delete(matchId)
    this.matchMutexes.delete(matchId)

    console.log(JSON.stringify({
      evt: 'match.cleanup',
      matchId,
    }))
  }

  private toView(match: RigMatch): MatchView {
    return {
      matchId: match.id,
      status: match.status,
      machineFirst: match.machineFirst,
      cheatCount: match.cheatCount,
      startedAt: match.startedAt,
      finishedAt: match.finishedAt,
      ...match.controller.getSnapshot(),
    }
  }

  getMatch(matchId: string): MatchView | undefined {
    const match = this.matches.get(matchId)
    return match ? this.toView(match) : undefined
  }

  getActiveMatch(): MatchView | undefined {
    return this.activeMatchId ? this.getMatch(this.activeMatchId) : undefined
  }

  cleanupMatch(matchId: string): void {
    this.abandonMatch(matchId)
    if (this.matches.has(matchId)) {
      this.removeMatch(matchId)
    }
  }
}
