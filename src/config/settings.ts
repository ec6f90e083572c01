/**
 * Application-wide settings.
 */


/**
 * The default vision model used for classification and field extraction.
 * Can be overridden per deployment with the `OPENAI_MODEL` environment variable.
 */
export const VISION_MODEL = 'gpt-4.1'

/**
 * Bill photos are normalized before they are sent to the model.
 * Phone cameras produce 4000px+ images, the model gains nothing from them.
 */
export const MODEL_IMAGE = {
   maxSide: 2048,
   jpegQuality: 80,
}

/**
 * Initial layout hints for a newly created party sheet.
 * A workbook grows on demand, so `cols` only sizes the pre-formatted
 * columns, it never limits how many fields a sheet can hold.
 */
export const LEDGER_SHEET_DEFAULTS = {
   cols: 20,
   colWidth: 18,
}

/**
 * Upload size cap in bytes. Anything larger is rejected before the pipeline runs.
 */
export const MAX_UPLOAD_BYTES = 15 * 1024 * 1024
