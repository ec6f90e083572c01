import 'dotenv/config'
import './utils/global-logger'
import { serve } from '@hono/node-server'
import { buildApp, createServices } from './app'
import { loadEnv } from './config/env'
import { InitializationError } from './utils/errors'


async function startServer() {
   process.on('SIGINT', shutdown)
   process.on('SIGTERM', shutdown)

   try {
      const env = loadEnv()
      const app = buildApp(await createServices(env))

      // Start the Node.js server
      serve({
         fetch: app.fetch,
         port: env.PORT
      })

      log.info(`Server running on port ${env.PORT}`)
      log.info('Application started successfully')

   } catch (error) {
      const message = error instanceof InitializationError
         ? 'Could not initialize the external services. The app cannot continue.'
         : 'Application Startup Error'
      log.error(error, message)
      shutdown('ERROR')
   }
}


// --- Graceful Shutdown Handler ---
function shutdown(signal: string) {
   log.info(`${signal} received. Shutting down...`)
   // Give pino's transports a moment to flush before exiting
   setTimeout(() => process.exit(signal === 'ERROR' ? 1 : 0), 500)
}


void startServer()
