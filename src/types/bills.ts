// Domain types shared by the pipeline stages, stores and the HTTP layer
import { BILL_CATEGORIES, STAGES } from '../config/constants'

export type BillCategory = (typeof BILL_CATEGORIES)[number]

export type ImageMimeType = 'image/jpeg' | 'image/png'

/**
 * A photographed bill as received from the upload form.
 * Lives for a single request and is never persisted as such.
 */
export interface BillImage {
   bytes: Buffer
   fileName: string
   mimeType: ImageMimeType
}

export interface Classification {
   billCategory: BillCategory
   partyName: string
}

/**
 * Field name to value, in the order the model returned them.
 * The field set is open: bills from new parties may carry extra fields.
 */
export type BillRecord = Record<string, string>

/**
 * Result of a model-backed stage. A failed stage keeps the raw model text
 * so the user can see what the model actually answered.
 */
export type StageResult<T> =
   | { ok: true, value: T }
   | { ok: false, reason: string, raw: string }

export type PipelineStage = (typeof STAGES)[number]

export type FailedStage = 'classification' | 'extraction'

export interface TableHandle {
   title: string
}

export interface LedgerRow {
   table: string
   header: string[]
   row: string[]
   rowNumber: number
}

export interface LedgerTable {
   header: string[]
   rows: string[][]
}

export type PipelineOutcome =
   | {
      status: 'done'
      classification: Classification
      archiveUrl: string
      record: BillRecord
      ledgerRow: LedgerRow
      trace: PipelineStage[]
   }
   | {
      status: 'failed'
      stage: FailedStage
      reason: string
      raw: string
      classification?: Classification
      archiveUrl?: string
      trace: PipelineStage[]
   }
