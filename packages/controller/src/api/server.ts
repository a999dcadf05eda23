import express from 'express'
import { createServer, type Server } from 'http'
import { silentLogger, type Logger } from '../utils/logger'
import { createHealthRouter, type StatusProvider } from './routes/health.routes'

/**
 * Running health server
 */
export interface HealthServer {
  readonly port: number
  close(): Promise<void>
}

/**
 * Build the express app serving the health routes
 */
export const createHealthApp = (controller: StatusProvider): express.Application => {
  const app: express.Application = express()
  app.disable('x-powered-by')
  app.use(createHealthRouter(controller))
  return app
}

/**
 * Listen on `port` (0 picks a free one) and resolve once bound
 */
export const startHealthServer = (
  controller: StatusProvider,
  port: number,
  logger: Logger = silentLogger
): Promise<HealthServer> => {
  const httpServer: Server = createServer(createHealthApp(controller))

  return new Promise((resolve, reject) => {
    httpServer.once('error', reject)
    httpServer.listen(port, () => {
      httpServer.off('error', reject)
      const address = httpServer.address()
      const boundPort = typeof address === 'object' && address !== null ? address.port : port
      logger.info({ port: boundPort }, 'Health server started')

      resolve({
        port: boundPort,
        close: () =>
          new Promise<void>((done, fail) => {
            httpServer.close((error) => (error ? fail(error) : done()))
          }),
      })
    })
  })
}
