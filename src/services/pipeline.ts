import { BillImage, Classification, PipelineOutcome, PipelineStage, StageResult } from '../types/bills'
import { CapabilityCallError } from '../utils/errors'
import { ArchiveStore } from './archive'
import { Classifier } from './classifier'
import { Extractor } from './extractor'
import { LedgerStore } from './ledger'

export interface PipelineDeps {
   classifier: Classifier
   extractor: Extractor
   archive: ArchiveStore
   ledger: LedgerStore
   /** Container id the per-party archive folders are created under */
   archiveRoot: string
}

export type TransitionListener = (stage: PipelineStage) => void

export interface Pipeline {
   run(image: BillImage, onTransition?: TransitionListener): Promise<PipelineOutcome>
}

/**
 * Runs a capability call, turning a transport failure into a CapabilityCallError
 * that names the stage. Nothing done before is undone.
 */
async function call<T>(stage: string, fn: () => Promise<T>): Promise<T> {
   try {
      return await fn()
   } catch (error) {
      throw new CapabilityCallError(stage, error)
   }
}

/**
 * One bill, one linear run:
 * received → classified → filed → archived → extracted → recorded → done.
 * A classification failure ends the run before anything is stored.
 * An extraction failure ends it after the image is archived; the archive is kept.
 */
export function createPipeline(deps: PipelineDeps): Pipeline {
   const { classifier, extractor, archive, ledger, archiveRoot } = deps

   return {
      async run(image, onTransition) {
         const trace: PipelineStage[] = []
         const enter = (stage: PipelineStage, context: Record<string, unknown> = {}) => {
            trace.push(stage)
            log.info({ fileName: image.fileName, stage, ...context }, `Bill ${stage}`)
            onTransition?.(stage)
         }

         enter('received', { bytes: image.bytes.length, mimeType: image.mimeType })

         const classified: StageResult<Classification> =
            await call('classification', () => classifier.classify(image))
         if (!classified.ok) {
            return {
               status: 'failed',
               stage: 'classification',
               reason: classified.reason,
               raw: classified.raw,
               trace,
            }
         }
         const classification = classified.value
         enter('classified', { ...classification })

         const { partyName } = classification
         const containerId = await call('archive folder', () =>
            archive.resolveOrCreateContainer(archiveRoot, partyName)
         )
         const table = await call('ledger sheet', () => ledger.resolveOrCreateTable(partyName))
         enter('filed', { containerId, table: table.title })

         const archiveUrl = await call('archive upload', () =>
            archive.store(containerId, image.fileName, image.bytes, image.mimeType)
         )
         enter('archived', { archiveUrl })

         const extracted = await call('extraction', () => extractor.extract(image))
         if (!extracted.ok) {
            return {
               status: 'failed',
               stage: 'extraction',
               reason: extracted.reason,
               raw: extracted.raw,
               classification,
               archiveUrl,
               trace,
            }
         }
         const record = extracted.value
         enter('extracted', { fields: Object.keys(record).length })

         const ledgerRow = await call('ledger update', () => ledger.upsertRow(table, record))
         enter('recorded', { table: ledgerRow.table, rowNumber: ledgerRow.rowNumber })

         enter('done')
         return { status: 'done', classification, archiveUrl, record, ledgerRow, trace }
      },
   }
}
