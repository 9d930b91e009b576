import type { Namespace } from 'socket.io'
import { formatFrameHex } from '../protocol/frame.js'
import { TransportError, type Transport, type TransportResult } from './types.js'

export const ACTUATOR_NAMESPACE = '/actuator'

/**
 * Hands frames to the actuator bridge connected on the `/actuator` namespace.
 * The bridge owns the serial link and acknowledges each `frame` event once the
 * bytes are written.
 */
export class SocketActuatorTransport implements Transport {
  constructor(
    private readonly namespace: Namespace,
    private readonly ackTimeoutMs: number
  ) {}

  async send(frame: Buffer): Promise<TransportResult> {
    const sockets = await this.namespace.fetchSockets()
    if (sockets.length === 0) {
      return { ok: false, error: new TransportError('no_actuator', 'No actuator bridge connected') }
    }

    try {
      await this.namespace.timeout(this.ackTimeoutMs).emitWithAck('frame', frame)
    } catch (error) {
      console.log(JSON.stringify({
        evt: 'transport.ack.missing',
        frame: formatFrameHex(frame),
        bridges: sockets.length,
        timeoutMs: this.ackTimeoutMs,
      }))
      return {
        ok: false,
        error: new TransportError('ack_timeout', `Actuator did not acknowledge within ${this.ackTimeoutMs}ms`, { cause: error }),
      }
    }

    console.log(JSON.stringify({
      evt: 'transport.sent',
      frame: formatFrameHex(frame),
      bridges: sockets.length,
    }))
    return { ok: true }
  }
}
