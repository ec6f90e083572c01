import { Readable } from 'stream'
import ExcelJS from 'exceljs'
import type { Workbook, Worksheet } from 'exceljs'
import { LEDGER_SHEET_DEFAULTS } from '../config/settings'
import { XLSX_MIMETYPE } from '../config/constants'
import { BillRecord, LedgerRow, LedgerTable, TableHandle } from '../types/bills'
import { createKeyLock, KeyLock } from '../utils/key-lock'
import { createCanonicalNameKey, toSheetTitle } from '../utils/string-utils'
import { ObjectBucket } from './bucket'

/**
 * Where the ledger workbook lives. `id` names the ledger document.
 */
export interface WorkbookSource {
   readonly id: string
   load(): Promise<Workbook>
   save(workbook: Workbook): Promise<void>
}

export interface LedgerStore {
   resolveOrCreateTable(name: string): Promise<TableHandle>
   upsertRow(table: TableHandle, record: BillRecord): Promise<LedgerRow>
   readTable(table: TableHandle): Promise<LedgerTable>
   exportWorkbook(): Promise<Buffer>
}

/**
 * Keeps the ledger as one .xlsx object in the bucket.
 * A missing object is an empty workbook; it is created by the first save.
 */
export function bucketWorkbook(bucket: ObjectBucket, key: string): WorkbookSource {
   return {
      id: key,

      async load() {
         const workbook = new ExcelJS.Workbook()
         const data = await bucket.getObject(key)
         if (data) await workbook.xlsx.read(Readable.from(data))
         return workbook
      },

      async save(workbook) {
         const data = Buffer.from(await workbook.xlsx.writeBuffer())
         await bucket.putObject(key, data, XLSX_MIMETYPE)
      },
   }
}


// --- Sheet helpers ---

const cellTexts = (sheet: Worksheet, rowNumber: number): string[] => {
   const row = sheet.getRow(rowNumber)
   const texts: string[] = []
   for (let col = 1; col <= row.cellCount; col++) {
      texts.push(row.getCell(col).text)
   }
   return texts
}

const readHeader = (sheet: Worksheet): string[] =>
   sheet.rowCount ? cellTexts(sheet, 1) : []

const writeHeaderCells = (sheet: Worksheet, startCol: number, names: string[]) => {
   const row = sheet.getRow(1)
   names.forEach((name, i) => {
      row.getCell(startCol + i).value = name
   })
   row.font = { bold: true }
}

const findSheet = (workbook: Workbook, title: string): Worksheet | undefined => {
   const exact = workbook.worksheets.find(sheet => sheet.name === title)
   if (exact) return exact

   const key = createCanonicalNameKey(title)
   return workbook.worksheets.find(sheet => createCanonicalNameKey(sheet.name) === key)
}

const addSheet = (workbook: Workbook, title: string): Worksheet => {
   const sheet = workbook.addWorksheet(title, {
      views: [{ state: 'frozen', ySplit: 1 }],
   })
   for (let col = 1; col <= LEDGER_SHEET_DEFAULTS.cols; col++) {
      sheet.getColumn(col).width = LEDGER_SHEET_DEFAULTS.colWidth
   }
   return sheet
}

const requireSheet = (workbook: Workbook, { title }: TableHandle): Worksheet => {
   const sheet = workbook.worksheets.find(s => s.name === title)
   if (!sheet) throw new Error(`Ledger sheet "${title}" does not exist`)
   return sheet
}


/**
 * Per-party ledger sheets in one workbook.
 *
 * Every operation is a full load-modify-save of the workbook, so each one runs
 * under the ledger's mutex: two bills for the same party cannot interleave
 * their header reconciliation. The lock is per ledger document rather than
 * per sheet because saving rewrites every sheet.
 */
export function createLedgerStore(
   source: WorkbookSource,
   lock: KeyLock = createKeyLock()
): LedgerStore {
   const withWorkbook = <T>(task: (workbook: Workbook) => Promise<T>) =>
      lock.run(source.id, async () => task(await source.load()))

   return {
      /**
       * Finds the party's sheet by exact title, then case-insensitively,
       * and only creates a new sheet when neither matches.
       */
      resolveOrCreateTable(name) {
         const title = toSheetTitle(name)

         return withWorkbook(async workbook => {
            const existing = findSheet(workbook, title)
            if (existing) {
               log.debug({ requested: title, title: existing.name }, 'Ledger sheet found')
               return { title: existing.name }
            }

            addSheet(workbook, title)
            await source.save(workbook)
            log.info({ title, ledger: source.id }, 'Ledger sheet created')
            return { title }
         })
      },

      /**
       * Appends the record as a new row, first widening the header with any
       * field names it has not seen. Existing columns are never reordered or
       * removed, and rows written earlier are left as they are.
       */
      upsertRow(table, record) {
         const keys = Object.keys(record)
         if (!keys.length) {
            return Promise.reject(new Error('Cannot record a bill without fields'))
         }

         return withWorkbook(async workbook => {
            const sheet = requireSheet(workbook, table)

            const current = readHeader(sheet)
            const newKeys = keys.filter(key => !current.includes(key))

            if (!current.length) {
               writeHeaderCells(sheet, 1, keys)
            } else if (newKeys.length) {
               writeHeaderCells(sheet, current.length + 1, newKeys)
            }

            // The sheet's own header row is the column order from here on
            const header = readHeader(sheet)
            const row = header.map(name => Object.hasOwn(record, name) ? record[name] : '')
            const { number: rowNumber } = sheet.addRow(row)

            await source.save(workbook)
            log.info(
               { table: table.title, rowNumber, addedColumns: current.length ? newKeys : keys },
               'Ledger row appended'
            )

            return { table: table.title, header, row, rowNumber }
         })
      },

      readTable(table) {
         return withWorkbook(async workbook => {
            const sheet = requireSheet(workbook, table)
            const rows: string[][] = []
            for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
               rows.push(cellTexts(sheet, rowNumber))
            }
            return { header: readHeader(sheet), rows }
         })
      },

      exportWorkbook() {
         return withWorkbook(async workbook => Buffer.from(await workbook.xlsx.writeBuffer()))
      },
   }
}
