import 'dotenv/config'
import { buildServer, RIG_NAMESPACE } from './app.js'
import { loadConfig } from './config/env.js'
import { ACTUATOR_NAMESPACE } from './transport/socketTransport.js'

const config = loadConfig()
const { server } = await buildServer({ config })

const shutdown = async (signal: string) => {
  console.log(JSON.stringify({ evt: 'server.stop', signal }))
  try {
    await server.close()
    process.exit(0)
  } catch (err) {
    server.log.error(err)
    process.exit(1)
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'))
process.on('SIGTERM', () => void shutdown('SIGTERM'))

try {
  await server.listen({ port: config.port, host: config.host })

  console.log(JSON.stringify({
    evt: 'server.start',
    port: config.port,
    namespaces: [RIG_NAMESPACE, ACTUATOR_NAMESPACE],
    machineFirst: config.machineFirst,
    openingPosition: config.openingPosition ?? null,
    humanColor: config.humanColor,
  }))
} catch (err) {
  if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
    console.log(JSON.stringify({
      evt: 'server.error',
      error: 'EADDRINUSE',
      port: config.port,
      message: `Port ${config.port} is already in use`,
    }))
    process.exit(1)
  }
  server.log.error(err)
  process.exit(1)
}
