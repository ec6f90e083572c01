import { Hono } from 'hono'
import { billApiHandler, billFormHandler } from './api/bill-upload'
import { ledgerDownloadHandler } from './api/ledger-download'
import { Env } from './config/env'
import { initializeConnections } from './connections'
import { createArchiveStore } from './services/archive'
import { s3Bucket } from './services/bucket'
import { createClassifier } from './services/classifier'
import { createExtractor } from './services/extractor'
import { html } from './services/html'
import { bucketWorkbook, createLedgerStore, LedgerStore } from './services/ledger'
import { openaiModel } from './services/model'
import { createPipeline, Pipeline } from './services/pipeline'

export interface AppServices {
   pipeline: Pipeline
   ledger: LedgerStore
   /** File name offered when the ledger workbook is downloaded */
   ledgerFileName: string
}

/**
 * Wires the production services: OpenAI for the model, one S3 bucket for
 * both the archive and the ledger workbook.
 */
export async function createServices(env: Env): Promise<AppServices> {
   const { openai, s3 } = await initializeConnections(env)

   const model = openaiModel(openai, env.OPENAI_MODEL)
   const bucket = s3Bucket(s3, { bucket: env.AWS_BUCKET_NAME, region: env.AWS_REGION })
   const ledger = createLedgerStore(bucketWorkbook(bucket, env.LEDGER_KEY))

   const pipeline = createPipeline({
      classifier: createClassifier(model),
      extractor: createExtractor(model),
      archive: createArchiveStore(bucket),
      ledger,
      archiveRoot: env.ARCHIVE_ROOT,
   })

   return {
      pipeline,
      ledger,
      ledgerFileName: env.LEDGER_KEY.split('/').pop() || 'ledger.xlsx',
   }
}

export function buildApp({ pipeline, ledger, ledgerFileName }: AppServices) {
   log.info('Building application...')

   // Initialize Hono server app
   const app = new Hono()

   // Upload page
   app.get('/', (c) => c.html(html.renderBillPage()))
   app.post('/', billFormHandler(pipeline))

   // API routes
   app.post('/api/bills', billApiHandler(pipeline))
   app.get('/api/ledger', ledgerDownloadHandler(ledger, ledgerFileName))

   // Define a health check endpoint
   app.get('/health', (c) => c.json({ status: 'ok' }))

   // Error handling
   app.onError((err, c) => {
      log.error(err, 'Error handling request')
      return c.json({ error: 'Internal server error' }, 500)
   })

   return app
}
