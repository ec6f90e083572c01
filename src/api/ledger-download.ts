import { Context } from 'hono'
import { XLSX_MIMETYPE } from '../config/constants'
import { LedgerStore } from '../services/ledger'

export const ledgerDownloadHandler = (ledger: LedgerStore, fileName: string) => async (c: Context) => {
   const data = await ledger.exportWorkbook()

   log.info({ fileName, bytes: data.byteLength }, 'Ledger workbook downloaded')

   // copied into an ArrayBuffer holding only the workbook's bytes
   return c.body(new Uint8Array(data).buffer, 200, {
      'Content-Type': XLSX_MIMETYPE,
      'Content-Disposition': `attachment; filename="${fileName}"`,
   })
}
