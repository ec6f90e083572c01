import { describe, it, expect, beforeEach } from 'vitest'
import { Readable } from 'stream'
import ExcelJS from 'exceljs'
import { bucketWorkbook, createLedgerStore, LedgerStore } from '../src/services/ledger'
import { BillRecord } from '../src/types/bills'
import { memoryBucket } from './fakes'

const LEDGER_KEY = 'ledgers/test.xlsx'

describe('ledger store', () => {
   let bucket: ReturnType<typeof memoryBucket>
   let ledger: LedgerStore

   beforeEach(() => {
      bucket = memoryBucket()
      ledger = createLedgerStore(bucketWorkbook(bucket, LEDGER_KEY))
   })

   it('writes the first record keys as the header', async () => {
      const table = await ledger.resolveOrCreateTable('ACME')

      const written = await ledger.upsertRow(table, { 'Bill No': '1160', 'Weight': '27540' })

      expect(written).toEqual({
         table: 'ACME',
         header: ['Bill No', 'Weight'],
         row: ['1160', '27540'],
         rowNumber: 2,
      })
   })

   it('appends new fields to the header without widening older rows', async () => {
      const table = await ledger.resolveOrCreateTable('ACME')
      await ledger.upsertRow(table, { 'Bill No': '1160', 'Weight': '27540' })

      const written = await ledger.upsertRow(table, { 'Bill No': '1161', 'Rate': '2020' })

      expect(written.header).toEqual(['Bill No', 'Weight', 'Rate'])
      expect(written.row).toEqual(['1161', '', '2020'])
      expect(written.rowNumber).toBe(3)

      expect(await ledger.readTable(table)).toEqual({
         header: ['Bill No', 'Weight', 'Rate'],
         rows: [
            ['1160', '27540'],
            ['1161', '', '2020'],
         ],
      })
   })

   it('keeps the header order when the same keys come in another order', async () => {
      const table = await ledger.resolveOrCreateTable('ACME')
      await ledger.upsertRow(table, { 'Bill No': '1', 'Date': '01/04/2024', 'Bags': '500' })

      const written = await ledger.upsertRow(table, { 'Bags': '320', 'Bill No': '2', 'Date': '02/04/2024' })
      const again = await ledger.upsertRow(table, { 'Bags': '120', 'Bill No': '3', 'Date': '03/04/2024' })

      expect(written.header).toEqual(['Bill No', 'Date', 'Bags'])
      expect(again.header).toEqual(['Bill No', 'Date', 'Bags'])
      expect(again.row).toEqual(['3', '03/04/2024', '120'])
   })

   it('never shrinks the header and sizes each row to the header at write time', async () => {
      const table = await ledger.resolveOrCreateTable('ACME')
      const records: BillRecord[] = [
         { 'Bill No': '1' },
         { 'Lorry No': 'MP09 AB 1234' },
         { 'Bill No': '3' },
         { 'Quality': 'Paddy', 'Bill No': '4' },
      ]

      const lengths: number[] = []
      for (const record of records) {
         const { header, row } = await ledger.upsertRow(table, record)
         expect(row).toHaveLength(header.length)
         lengths.push(header.length)
      }

      expect(lengths).toEqual([1, 2, 2, 3])
   })

   it('reuses a sheet whose title differs only in case', async () => {
      const first = await ledger.resolveOrCreateTable('ABC')
      const second = await ledger.resolveOrCreateTable('abc')

      expect(first).toEqual({ title: 'ABC' })
      expect(second).toEqual({ title: 'ABC' })

      const workbook = new ExcelJS.Workbook()
      await workbook.xlsx.read(Readable.from(await ledger.exportWorkbook()))
      expect(workbook.worksheets.map(sheet => sheet.name)).toEqual(['ABC'])
   })

   it('writes to the existing sheet when the party comes back in another case', async () => {
      await ledger.resolveOrCreateTable('Acme')
      const table = await ledger.upsertRow(await ledger.resolveOrCreateTable('acme'), { 'Bill No': '9' })

      expect(table.table).toBe('Acme')
   })

   it('turns party names into legal sheet titles', async () => {
      expect(await ledger.resolveOrCreateTable('M/s. Ram: Traders [Katni]')).toEqual({ title: 'M-s. Ram- Traders -Katni-' })
      expect(await ledger.resolveOrCreateTable('Shri Radhe Krishna Agro Industries Pvt Ltd'))
         .toEqual({ title: 'Shri Radhe Krishna Agro Industr' })
   })

   it('gives a party named like the reserved History sheet a usable sheet', async () => {
      const table = await ledger.resolveOrCreateTable('History')
      const written = await ledger.upsertRow(table, { 'Bill No': '77' })

      expect(table).toEqual({ title: 'History -' })
      expect(written.rowNumber).toBe(2)
      expect(await ledger.resolveOrCreateTable('history')).toEqual({ title: 'History -' })
   })

   it('keeps parties in separate sheets of one workbook object', async () => {
      const acme = await ledger.resolveOrCreateTable('ACME')
      const sharma = await ledger.resolveOrCreateTable('Sharma Rice Mill')
      await ledger.upsertRow(acme, { 'Bill No': '1' })
      await ledger.upsertRow(sharma, { 'Weight': '900' })

      expect([...bucket.objects.keys()]).toEqual([LEDGER_KEY])
      expect(await ledger.readTable(acme)).toEqual({ header: ['Bill No'], rows: [['1']] })
      expect(await ledger.readTable(sharma)).toEqual({ header: ['Weight'], rows: [['900']] })
   })

   it('does not lose rows or columns when bills arrive concurrently', async () => {
      const table = await ledger.resolveOrCreateTable('ACME')

      const written = await Promise.all(
         ['A', 'B', 'C', 'D', 'E'].map(field => ledger.upsertRow(table, { [field]: `${field}-value` }))
      )

      expect(written.map(w => w.rowNumber)).toEqual([2, 3, 4, 5, 6])
      const { header, rows } = await ledger.readTable(table)
      expect(header).toEqual(['A', 'B', 'C', 'D', 'E'])
      expect(rows).toHaveLength(5)
      expect(rows[4]).toEqual(['', '', '', '', 'E-value'])
   })

   it('rejects an empty record', async () => {
      const table = await ledger.resolveOrCreateTable('ACME')

      await expect(ledger.upsertRow(table, {})).rejects.toThrow('Cannot record a bill without fields')
   })

   it('rejects a sheet that does not exist', async () => {
      await expect(ledger.readTable({ title: 'Nobody' })).rejects.toThrow('Ledger sheet "Nobody" does not exist')
   })
})
