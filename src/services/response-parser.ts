import { ParseError } from '../utils/errors'

export type ParseResult =
   | { ok: true, value: Record<string, unknown> }
   | { ok: false, error: ParseError }

// ```json ... ``` or ``` ... ```, the language tag is optional
const FENCED = /^`{3,}[ \t]*([A-Za-z]+)?[ \t]*\r?\n?([\s\S]*?)\r?\n?[ \t]*`{3,}$/

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
   typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Removes Markdown noise models put around JSON answers:
 * a surrounding code fence with its language tag, stray single backticks,
 * or a bare `json` token in front of the object.
 */
export function stripFormatting(raw: string): string {
   let text = raw.trim()

   const fenced = text.match(FENCED)
   if (fenced) text = fenced[2].trim()

   return text
      .replace(/^`+|`+$/g, '')
      .replace(/^json\b\s*/i, '')
      .trim()
}

/**
 * Decodes a model answer that should contain exactly one JSON object.
 * Never throws: failures come back as a `ParseError` holding the raw text.
 * Values are not type-checked here.
 */
export function parseModelJson(raw: string): ParseResult {
   const text = stripFormatting(raw)

   let value: unknown
   try {
      value = JSON.parse(text)
   } catch (error) {
      const detail = error instanceof Error ? error.message : String(error)
      return { ok: false, error: new ParseError(`Model answer is not valid JSON: ${detail}`, raw) }
   }

   if (!isPlainObject(value)) {
      return { ok: false, error: new ParseError('Model answer is not a JSON object', raw) }
   }

   return { ok: true, value }
}
