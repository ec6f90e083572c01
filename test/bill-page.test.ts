import { describe, it, expect } from 'vitest'
import { stageStatuses } from '../src/components/BillPage'
import { html } from '../src/services/html'
import { PipelineOutcome } from '../src/types/bills'

const classification = { billCategory: 'Loading Bill', partyName: 'ACME' } as const

describe('bill page', () => {
   it('marks the stage after the last one reached as failed', () => {
      expect(stageStatuses(['received'], true).map(s => s.status))
         .toEqual(['done', 'failed', 'pending', 'pending', 'pending', 'pending', 'pending'])
   })

   it('leaves unreached stages pending when nothing failed', () => {
      expect(stageStatuses(['received', 'classified'], false).map(s => s.status))
         .toEqual(['done', 'done', 'pending', 'pending', 'pending', 'pending', 'pending'])
   })

   it('renders the empty upload form', () => {
      const page = html.renderBillPage()

      expect(page.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true)
      expect(page).toContain('<form method="post" action="/" enctype="multipart/form-data" class="mb-4">')
      expect(page).not.toContain('data-status')
   })

   it('renders a completed run', () => {
      const outcome: PipelineOutcome = {
         status: 'done',
         classification,
         archiveUrl: 'https://bucket.test/bills/ACME/0a1b2c3d-bill.png',
         record: { 'Bill No': '1160', 'Weight': '27540' },
         ledgerRow: { table: 'ACME', header: ['Bill No', 'Weight'], row: ['1160', '27540'], rowNumber: 2 },
         trace: ['received', 'classified', 'filed', 'archived', 'extracted', 'recorded', 'done'],
      }

      const page = html.renderBillPage({ outcome })

      expect(page).toContain('Detected <b>Loading Bill</b> for party: <b>ACME</b>')
      expect(page).toContain('Recorded in sheet <b>ACME</b>, row 2.')
      expect(page).toContain('<a href="https://bucket.test/bills/ACME/0a1b2c3d-bill.png" target="_blank" rel="noreferrer">View File</a>')
      expect(page).toContain('<tr><th scope="row">Bill No</th><td>1160</td></tr>')
      expect(page.match(/data-status="done"/g)).toHaveLength(7)
   })

   it('renders a classification failure with the raw model answer', () => {
      const page = html.renderBillPage({
         outcome: {
            status: 'failed',
            stage: 'classification',
            reason: 'Model answer is not valid JSON: Unexpected token',
            raw: 'I cannot read <this> bill',
            trace: ['received'],
         },
      })

      expect(page).toContain('Could not determine the bill type or party name.')
      expect(page).toContain('>I cannot read &lt;this&gt; bill</textarea>')
      expect(page).not.toContain('View File')
   })

   it('renders a transport error with the stage it stopped at', () => {
      const page = html.renderBillPage({
         trace: ['received', 'classified', 'filed'],
         error: { stage: 'archive upload', message: 'An external service did not respond as expected. Please try again.' },
      })

      expect(page).toContain(
         '<div class="alert alert-danger">Processing stopped at archive upload: ' +
         'An external service did not respond as expected. Please try again.</div>'
      )
      expect(page).toContain('<li class="text-danger" data-status="failed">')
   })
})
