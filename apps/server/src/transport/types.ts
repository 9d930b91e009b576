export type TransportErrorCode = 'no_actuator' | 'ack_timeout'

export class TransportError extends Error {
  readonly code: TransportErrorCode

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
    this.code = code
  }
}

export type TransportResult = { ok: true } | { ok: false; error: TransportError }

// Consumer side of the actuator link. Implementations never retry.
export interface Transport {
  send(frame: Buffer): Promise<TransportResult>
}
