import extractPrompt from '../prompts/extract.md?raw'
import { NOT_AVAILABLE } from '../config/constants'
import { BillImage, BillRecord, StageResult } from '../types/bills'
import { ModelClient } from './model'
import { parseModelJson } from './response-parser'

/**
 * Brings one extracted value into cell form.
 * Missing values become the N/A placeholder, never an empty cell.
 */
export function toCellValue(value: unknown): string {
   if (value === null || value === undefined) return NOT_AVAILABLE
   if (typeof value === 'string') return value.trim() || NOT_AVAILABLE
   if (typeof value === 'number' || typeof value === 'boolean') return String(value)
   return JSON.stringify(value)
}

/**
 * Converts the parsed model answer into a BillRecord, keeping the model's key order.
 * Blank keys are dropped: they cannot become a ledger column.
 */
export function toBillRecord(fields: Record<string, unknown>): BillRecord {
   const record: BillRecord = {}
   for (const [key, value] of Object.entries(fields)) {
      const name = key.trim()
      if (!name) continue
      record[name] = toCellValue(value)
   }
   return record
}

export interface Extractor {
   extract(image: BillImage): Promise<StageResult<BillRecord>>
}

export function createExtractor(model: ModelClient): Extractor {
   return {
      async extract({ bytes, mimeType, fileName }) {
         const raw = await model.generate(extractPrompt, bytes, mimeType)

         const parsed = parseModelJson(raw)
         if (!parsed.ok) {
            log.warn({ fileName, err: parsed.error }, 'Extraction answer could not be parsed')
            return { ok: false, reason: parsed.error.message, raw }
         }

         const record = toBillRecord(parsed.value)
         if (!Object.keys(record).length) {
            log.warn({ fileName }, 'Extraction answer has no fields')
            return { ok: false, reason: 'Model answer has no fields', raw }
         }

         log.info({ fileName, fields: Object.keys(record) }, 'Bill fields extracted')
         return { ok: true, value: record }
      },
   }
}
