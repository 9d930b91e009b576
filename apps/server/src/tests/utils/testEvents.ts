import { io as ioc, type Socket } from 'socket.io-client'

export interface WaitForSocketEventOptions {
  timeoutMs?: number
  count?: number
}

/**
 * Wait for specific socket events to be emitted
 */
export function waitForSocketEvent<T = unknown>(
  socket: Socket,
  eventName: string,
  options: WaitForSocketEventOptions = {}
): Promise<T[]> {
  const { timeoutMs = 2000, count = 1 } = options

  return new Promise((resolve, reject) => {
    const events: T[] = []

    const eventHandler = (data: T) => {
      events.push(data)
      if (events.length >= count) {
        cleanup()
        resolve(events)
      }
    }

    const timeoutId = setTimeout(() => {
      cleanup()
      reject(new Error(`Timeout waiting for ${count} ${eventName} event(s) after ${timeoutMs}ms. Received: ${events.length}`))
    }, timeoutMs)

    const cleanup = () => {
      clearTimeout(timeoutId)
      socket.off(eventName, eventHandler)
    }

    socket.on(eventName, eventHandler)
  })
}

/**
 * Connect a client to a namespace and resolve once the handshake completes
 */
export function connectClient(url: string, timeoutMs = 5000): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const client = ioc(url, {
      forceNew: true,
      transports: ['websocket'],
    })

    const timeoutId = setTimeout(() => {
      client.disconnect()
      reject(new Error(`Connection timeout: ${url}`))
    }, timeoutMs)

    client.on('connect', () => {
      clearTimeout(timeoutId)
      resolve(client)
    })

    client.on('connect_error', (error) => {
      clearTimeout(timeoutId)
      client.disconnect()
      reject(new Error(`Connection failed: ${error.message}`))
    })
  })
}
