/**
 * Error types that cross module boundaries.
 * Model output problems are not in here: the stages report those as values.
 */

/**
 * Configuration is incomplete or an external client could not start.
 * Fatal for the process: no bill is processed without all three capabilities.
 */
export class InitializationError extends Error {
   constructor(message: string, options?: { cause?: unknown }) {
      super(message, options)
      this.name = 'InitializationError'
   }
}

/**
 * Model text that is not a JSON object.
 * `raw` is the untouched text, kept for display.
 */
export class ParseError extends Error {
   readonly raw: string

   constructor(message: string, raw: string) {
      super(message)
      this.name = 'ParseError'
      this.raw = raw
   }
}

/**
 * A call into the model, the archive or the ledger failed in transport.
 * Steps completed before the failure are not rolled back.
 */
export class CapabilityCallError extends Error {
   readonly stage: string

   constructor(stage: string, cause: unknown) {
      const detail = cause instanceof Error ? cause.message : String(cause)
      super(`${stage} failed: ${detail}`, { cause })
      this.name = 'CapabilityCallError'
      this.stage = stage
   }
}

/**
 * The uploaded file is missing, too large, or not a JPEG/PNG image.
 */
export class UploadError extends Error {
   constructor(message: string) {
      super(message)
      this.name = 'UploadError'
   }
}
