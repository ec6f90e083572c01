/**
 * Creates a canonical, normalized key from a string.
 * Used to compare party names regardless of case and spacing.
 * - Trims whitespace from both ends.
 * - Replaces multiple whitespace characters with a single space.
 * - Applies Unicode normalization (NFKC form).
 * - Converts to lowercase.
 */
export function createCanonicalNameKey(str: string): string {
   if (!str) return ''
   return str
      .trim()
      .replace(/\s+/g, ' ')
      .normalize('NFKC')
      .toLowerCase()
}

// Excel rejects these in sheet names
const INVALID_SHEET_CHARS = /[*?:\\/[\]]/g
const MAX_SHEET_NAME = 31
// exceljs refuses this one, Excel keeps it for change tracking
const RESERVED_SHEET_NAME = 'history'

/**
 * Turns a party name into a legal worksheet title.
 * The result keeps the party's own casing.
 */
export function toSheetTitle(name: string): string {
   const title = name
      .replace(INVALID_SHEET_CHARS, '-')
      .replace(/\s+/g, ' ')
      .trim()
      .replace(/^'+|'+$/g, '')
      .slice(0, MAX_SHEET_NAME)
      .trim()

   if (title.toLowerCase() === RESERVED_SHEET_NAME) return `${title} -`
   return title || 'Sheet'
}

/**
 * Turns a party name into a single path segment for an archive folder.
 * Case is preserved: folder lookups are exact.
 */
export function toFolderName(name: string): string {
   return name.replace(/\//g, '-').trim()
}

/**
 * Makes an uploaded file name safe to use inside an object key.
 */
export function sanitizeFileName(fileName: string): string {
   const base = fileName.split(/[\\/]/).pop() ?? ''
   return base.trim().replace(/\s+/g, '_') || 'bill'
}
