import Fastify, { type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import fastifySocketIO from 'fastify-socket.io'
import type { Socket } from 'socket.io'
import type { RigConfig } from './config/env.js'
import { CalibrationSession, type CalibrationStepResult } from './services/calibrationService.js'
import type { ObservationOutcome } from './services/gameController.js'
import { MatchService, type MatchView, type SubmitResult } from './services/matchService.js'
import { ACTUATOR_NAMESPACE, SocketActuatorTransport } from './transport/socketTransport.js'
import type { Transport } from './transport/types.js'
import type { CalibrationUpdate, ClientToServerEvents, ServerToClientEvents } from './types/rig.js'
import { parseCalibrationPlan, parseMatchId, parseObservation, parseStartMatch } from './validation.js'

export const RIG_NAMESPACE = '/rig'

export interface BuildServerOptions {
  config: RigConfig
  // Defaults to the Socket.IO actuator bridge on /actuator
  transport?: Transport
  logger?: boolean
}

export interface RigServer {
  server: FastifyInstance
  matchService: MatchService
}

// Outcomes go out as plain JSON; TransportError is flattened to code + message
export type WireOutcome =
  | Exclude<ObservationOutcome, { type: 'transport_failure' }>
  | { type: 'transport_failure'; code: string; message: string; result: string }

export function toWireOutcome(outcome: ObservationOutcome): WireOutcome {
  if (outcome.type !== 'transport_failure') {
    return outcome
  }
  return {
    type: 'transport_failure',
    code: outcome.error.code,
    message: outcome.error.message,
    result: outcome.result,
  }
}

function toCalibrationUpdate(result: CalibrationStepResult, remaining: number): CalibrationUpdate {
  switch (result.type) {
    case 'sent':
      return { status: 'sent', step: result.step, payload: result.payload, remaining: result.remaining }
    case 'complete':
      return { status: 'complete', remaining: 0 }
    case 'transport_failure':
      return { status: 'failed', step: result.step, remaining }
  }
}

export async function buildServer(options: BuildServerOptions): Promise<RigServer> {
  const { config } = options

  const server = Fastify({
    logger: options.logger === false
      ? false
      : { level: config.nodeEnv === 'development' ? 'info' : 'warn' },
  })

  await server.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
    credentials: true,
  })

  await server.register(fastifySocketIO, {
    cors: {
      origin: true,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  })

  const actuatorNamespace = server.io.of(ACTUATOR_NAMESPACE)
  const rigNamespace = server.io.of(RIG_NAMESPACE)

  const transport = options.transport ?? new SocketActuatorTransport(actuatorNamespace, config.actuatorAckTimeoutMs)
  const matchService = new MatchService(transport, {
    machineFirst: config.machineFirst,
    openingPosition: config.openingPosition,
    humanColor: config.humanColor,
  })

  let calibration: CalibrationSession | null = null

  function publish<E extends keyof ServerToClientEvents>(event: E, ...args: Parameters<ServerToClientEvents[E]>): void {
    rigNamespace.emit(event, ...args)
  }

  function publishOutcome(match: MatchView, outcome: ObservationOutcome): void {
    publish('matchState', match)

    switch (outcome.type) {
      case 'cheat':
        publish('cheatDetected', { matchId: match.matchId, from: outcome.from, to: outcome.to })
        break
      case 'rejected':
        publish('observationRejected', { matchId: match.matchId, reason: outcome.reason })
        break
      case 'transport_failure':
        publish('transportFailure', { matchId: match.matchId, code: outcome.error.code, message: outcome.error.message })
        break
      case 'moved':
        if (outcome.result !== 'in_progress') {
          publish('gameResult', { matchId: match.matchId, result: outcome.result, winningLine: match.winningLine })
        }
        break
      default:
        break
    }
  }

  function publishSubmit(matchId: string, result: SubmitResult): void {
    if (result.success) {
      publishOutcome(result.match, result.outcome)
    } else {
      publish('observationRejected', { matchId, reason: result.reason })
    }
  }

  async function stepCalibration(): Promise<CalibrationUpdate | null> {
    if (!calibration) {
      return null
    }
    const result = await calibration.next()
    const update = toCalibrationUpdate(result, calibration.remaining)
    publish('calibrationState', update)
    if (result.type === 'transport_failure') {
      publish('transportFailure', { matchId: null, code: result.error.code, message: result.error.message })
    }
    return update
  }

  server.get('/health', async () => {
    const active = matchService.getActiveMatch()
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      machineFirst: config.machineFirst,
      humanColor: config.humanColor,
      activeMatchId: active?.matchId ?? null,
    }
  })

  server.post('/matches', async (request, reply) => {
    const settings = parseStartMatch(request.body)
    if (!settings) {
      reply.code(400)
      return { error: 'Invalid match settings' }
    }

    const { match, opening } = await matchService.createMatch(settings)
    publishOutcome(match, opening)

    reply.code(201)
    return { match, opening: toWireOutcome(opening) }
  })

  server.get('/matches/active', async (_request, reply) => {
    const match = matchService.getActiveMatch()
    if (!match) {
      reply.code(404)
      return { error: 'No active match' }
    }
    return match
  })

  server.get('/matches/:matchId', async (request, reply) => {
    const matchId = parseMatchId(request.params)
    const match = matchId ? matchService.getMatch(matchId) : undefined
    if (!match) {
      reply.code(404)
      return { error: 'Match not found' }
    }
    return match
  })

  server.post('/matches/:matchId/observations', async (request, reply) => {
    const matchId = parseMatchId(request.params)
    if (!matchId) {
      reply.code(404)
      return { error: 'Match not found' }
    }

    // An empty body means the camera saw nothing new
    const observation = request.body === undefined || request.body === null ? null : parseObservation(request.body)
    if (request.body !== undefined && request.body !== null && !observation) {
      reply.code(400)
      return { error: 'Invalid observation' }
    }

    const result = await matchService.submitObservation(matchId, observation)
    publishSubmit(matchId, result)

    if (!result.success) {
      reply.code(result.reason === 'match_not_found' ? 404 : 409)
      return { error: result.reason }
    }

    return { outcome: toWireOutcome(result.outcome), match: result.match }
  })

  server.post('/calibration', async (request, reply) => {
    const plan = parseCalibrationPlan(request.body)
    if (!plan) {
      reply.code(400)
      return { error: 'Invalid calibration plan' }
    }

    calibration = new CalibrationSession(transport, plan)
    const update: CalibrationUpdate = { status: 'ready', remaining: calibration.remaining }
    publish('calibrationState', update)

    reply.code(201)
    return update
  })

  server.post('/calibration/step', async (_request, reply) => {
    const update = await stepCalibration()
    if (!update) {
      reply.code(409)
      return { error: 'No calibration in progress' }
    }
    if (update.status === 'failed') {
      reply.code(502)
    }
    return update
  })

  actuatorNamespace.on('connection', socket => {
    console.log(JSON.stringify({ evt: 'actuator.connected', socketId: socket.id }))
    socket.on('disconnect', reason => {
      console.log(JSON.stringify({ evt: 'actuator.disconnected', socketId: socket.id, reason }))
    })
  })

  rigNamespace.on('connection', (socket: Socket<ClientToServerEvents, ServerToClientEvents>) => {
    console.log(`Client connected to rig namespace: ${socket.id}`)
    socket.emit('welcome', 'Connected to rig')

    const active = matchService.getActiveMatch()
    if (active) {
      socket.emit('matchState', active)
    }

    const reportError = (context: string, error: unknown) => {
      const message = error instanceof Error ? error.message : String(error)
      console.error(JSON.stringify({ evt: 'socket.error', context, socketId: socket.id, message }))
      socket.emit('error', message)
    }

    socket.on('startMatch', async request => {
      const settings = parseStartMatch(request)
      if (!settings) {
        socket.emit('error', 'Invalid match settings')
        return
      }
      try {
        const { match, opening } = await matchService.createMatch(settings)
        publishOutcome(match, opening)
      } catch (error) {
        reportError('startMatch', error)
      }
    })

    socket.on('observation', async request => {
      const matchId = parseMatchId(request)
      const observation = parseObservation(request)
      if (!matchId || !observation) {
        socket.emit('error', 'Invalid observation')
        return
      }
      try {
        const result = await matchService.submitObservation(matchId, observation)
        publishSubmit(matchId, result)
      } catch (error) {
        reportError('observation', error)
      }
    })

    socket.on('startCalibration', plan => {
      const parsed = parseCalibrationPlan(plan)
      if (!parsed) {
        socket.emit('error', 'Invalid calibration plan')
        return
      }
      calibration = new CalibrationSession(transport, parsed)
      publish('calibrationState', { status: 'ready', remaining: calibration.remaining })
    })

    socket.on('calibrationStep', async () => {
      try {
        const update = await stepCalibration()
        if (!update) {
          socket.emit('error', 'No calibration in progress')
        }
      } catch (error) {
        reportError('calibrationStep', error)
      }
    })

    socket.on('disconnect', () => {
      console.log(`Client disconnected from rig namespace: ${socket.id}`)
    })
  })

  return { server, matchService }
}
