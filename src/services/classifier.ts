import { z } from 'zod'
import classifyPrompt from '../prompts/classify.md?raw'
import { BILL_CATEGORIES } from '../config/constants'
import { BillCategory, BillImage, Classification, StageResult } from '../types/bills'
import { ModelClient } from './model'
import { parseModelJson } from './response-parser'

const findCategory = (label: string): BillCategory | undefined =>
   BILL_CATEGORIES.find(category => category.toLowerCase() === label.trim().toLowerCase())

const classificationSchema = z.object({
   bill_type: z.string().transform((label, ctx) => {
      const category = findCategory(label)
      if (!category) {
         ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown bill type "${label}", expected ${BILL_CATEGORIES.join(' or ')}`,
         })
         return z.NEVER
      }
      return category
   }),
   party_name: z.string().trim().min(1, 'party name is empty'),
})

export interface Classifier {
   classify(image: BillImage): Promise<StageResult<Classification>>
}

export function createClassifier(model: ModelClient): Classifier {
   return {
      /**
       * Asks the model for the bill category and the primary party.
       * A malformed or incomplete answer is a terminal result for this bill, never retried.
       */
      async classify({ bytes, mimeType, fileName }) {
         const raw = await model.generate(classifyPrompt, bytes, mimeType)

         const parsed = parseModelJson(raw)
         if (!parsed.ok) {
            log.warn({ fileName, err: parsed.error }, 'Classification answer could not be parsed')
            return { ok: false, reason: parsed.error.message, raw }
         }

         const decoded = classificationSchema.safeParse(parsed.value)
         if (!decoded.success) {
            const reason = decoded.error.issues
               .map(issue => `${issue.path.join('.')}: ${issue.message}`)
               .join('; ')
            log.warn({ fileName, reason }, 'Classification answer is incomplete')
            return { ok: false, reason, raw }
         }

         const { bill_type, party_name } = decoded.data
         log.info({ fileName, billCategory: bill_type, partyName: party_name }, 'Bill classified')

         return { ok: true, value: { billCategory: bill_type, partyName: party_name } }
      },
   }
}
