import { Context } from 'hono'
import { html } from '../services/html'
import { image } from '../services/image'
import { Pipeline } from '../services/pipeline'
import { BillImage, PipelineStage } from '../types/bills'
import { CapabilityCallError, UploadError } from '../utils/errors'
import { readBillUpload } from './upload'

/**
 * Form submission from the upload page. Always answers with the page,
 * showing how far the bill got.
 */
export const billFormHandler = (pipeline: Pipeline) => async (c: Context) => {
   let bill: BillImage
   try {
      bill = await readBillUpload(c)
   } catch (error) {
      if (error instanceof UploadError) {
         return c.html(html.renderBillPage({ error: { message: error.message } }), 400)
      }
      throw error
   }

   const upload = {
      fileName: bill.fileName,
      previewUrl: await image.previewDataUrl(bill.bytes),
   }
   const trace: PipelineStage[] = []

   try {
      const outcome = await pipeline.run(bill, stage => trace.push(stage))
      return c.html(html.renderBillPage({ upload, outcome }))
   } catch (error) {
      if (!(error instanceof CapabilityCallError)) throw error

      log.error({ err: error, fileName: bill.fileName, stage: error.stage }, 'Bill processing failed')
      return c.html(html.renderBillPage({
         upload,
         trace,
         error: { stage: error.stage, message: 'An external service did not respond as expected. Please try again.' },
      }), 502)
   }
}

/**
 * JSON variant of the upload, for scripts and integrations.
 */
export const billApiHandler = (pipeline: Pipeline) => async (c: Context) => {
   let bill: BillImage
   try {
      bill = await readBillUpload(c)
   } catch (error) {
      if (error instanceof UploadError) {
         return c.json({ error: error.message }, 400)
      }
      throw error
   }

   const trace: PipelineStage[] = []

   try {
      const outcome = await pipeline.run(bill, stage => trace.push(stage))
      log.info({ fileName: bill.fileName, status: outcome.status }, 'Bill upload handled')
      return c.json(outcome, outcome.status === 'done' ? 201 : 422)
   } catch (error) {
      if (!(error instanceof CapabilityCallError)) throw error

      log.error({ err: error, fileName: bill.fileName, stage: error.stage }, 'Bill processing failed')
      return c.json({ error: error.message, stage: error.stage, trace }, 502)
   }
}
