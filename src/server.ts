import { createApp } from './app'
import { env } from './config/env'
import { logger } from './config/logger'

/**
 * Server entry point
 * Starts the Express server and handles graceful shutdown
 */

function startServer(): void {
  try {
    const app = createApp()

    const server = app.listen(env.port, () => {
      logger.info(`🚀 Server running on port ${env.port}`)
      logger.info(`📝 Environment: ${env.nodeEnv}`)
      logger.info(`🔗 API: http://localhost:${env.port}${env.apiPrefix}`)
    })

    // Graceful shutdown
    const shutdown = () => {
      logger.info('Shutting down server...')
      server.close((error) => {
        if (error) {
          logger.error('Error while closing server', error)
          process.exit(1)
        }
        process.exit(0)
      })
    }

    process.on('SIGTERM', shutdown)
    process.on('SIGINT', shutdown)
  } catch (error) {
    logger.error('Failed to start server', error)
    process.exit(1)
  }
}

startServer()
