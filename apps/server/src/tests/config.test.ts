import { describe, test, expect } from 'vitest'
import { loadConfig } from '../config/env.js'

describe('loadConfig', () => {
  test('uses the development defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      port: 8890,
      host: '0.0.0.0',
      machineFirst: false,
      openingPosition: undefined,
      humanColor: 'white',
      actuatorAckTimeoutMs: 2000,
    })
  })

  test('reads the rig settings outside development', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '9100',
      HOST: '127.0.0.1',
      MACHINE_FIRST: 'true',
      OPENING_POSITION: '4',
      HUMAN_COLOR: 'black',
      ACTUATOR_ACK_TIMEOUT_MS: '500',
    })

    expect(config).toEqual({
      nodeEnv: 'production',
      port: 9100,
      host: '127.0.0.1',
      machineFirst: true,
      openingPosition: 4,
      humanColor: 'black',
      actuatorAckTimeoutMs: 500,
    })
  })

  test('falls back to port 9001 outside development', () => {
    expect(loadConfig({ NODE_ENV: 'test' }).port).toBe(9001)
  })

  test('treats a blank opening position as unset', () => {
    expect(loadConfig({ OPENING_POSITION: ' ' }).openingPosition).toBeUndefined()
  })

  test('refuses settings the rig cannot play', () => {
    expect(() => loadConfig({ OPENING_POSITION: '9' })).toThrow('OPENING_POSITION must be a square 0-8, got "9"')
    expect(() => loadConfig({ HUMAN_COLOR: 'red' })).toThrow('HUMAN_COLOR must be "white" or "black", got "red"')
  })
})
