import { Server as SocketIOServer } from 'socket.io'
import { FastifyInstance } from 'fastify'

// Decorated by fastify-socket.io on register
declare module 'fastify' {
  interface FastifyInstance {
    io: SocketIOServer
  }
}
