// Bill categories as returned by the classifier
export const BILL_CATEGORIES = ['Loading Bill', 'Unloading Bill'] as const

// Placeholder the extractor uses for fields that are not on the bill
export const NOT_AVAILABLE = 'N/A'

// Pipeline states, in the order a successful run passes through them
export const STAGES = [
   'received',
   'classified',
   'filed',
   'archived',
   'extracted',
   'recorded',
   'done',
] as const

// Progress captions shown next to each stage on the upload page
export const STAGE_CAPTIONS = {
   received: 'Bill received',
   classified: 'Analyzing bill type and party name',
   filed: 'Creating folder and sheet for the party',
   archived: 'Uploading image to the archive',
   extracted: 'Extracting detailed data from the bill',
   recorded: 'Updating the ledger sheet',
   done: 'Process complete',
} as const satisfies Record<(typeof STAGES)[number], string>

export const ACCEPTED_EXTENSIONS = ['jpg', 'jpeg', 'png'] as const

export const XLSX_MIMETYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

// Content type S3 consoles use for zero-byte folder markers
export const FOLDER_MIMETYPE = 'application/x-directory'
