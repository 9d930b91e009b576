// Actuator frame: 0xAA 0x55 <payload> 0x9A, no length field, no checksum
export const FRAME_HEADER: readonly [number, number] = [0xaa, 0x55]
export const FRAME_TRAILER = 0x9a

export type FrameParseResult =
  | { valid: true; payload: string }
  | { valid: false; reason: 'too_short' | 'bad_header' | 'bad_trailer' }

export function encodeFrame(payload: string): Buffer {
  return Buffer.concat([
    Buffer.from(FRAME_HEADER),
    Buffer.from(payload, 'utf8'),
    Buffer.from([FRAME_TRAILER]),
  ])
}

/**
 * Receiver-side counterpart of {@link encodeFrame}. The actuator bridge knows
 * the payload length from the opcode, so this only checks the delimiters.
 */
export function parseFrame(frame: Uint8Array): FrameParseResult {
  if (frame.length < FRAME_HEADER.length + 1) {
    return { valid: false, reason: 'too_short' }
  }

  if (frame[0] !== FRAME_HEADER[0] || frame[1] !== FRAME_HEADER[1]) {
    return { valid: false, reason: 'bad_header' }
  }

  if (frame[frame.length - 1] !== FRAME_TRAILER) {
    return { valid: false, reason: 'bad_trailer' }
  }

  const body = frame.subarray(FRAME_HEADER.length, frame.length - 1)
  return { valid: true, payload: Buffer.from(body).toString('utf8') }
}

export function formatFrameHex(frame: Uint8Array): string {
  return Array.from(frame, byte => byte.toString(16).toUpperCase().padStart(2, '0')).join(' ')
}
