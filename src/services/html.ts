import React from 'react'
import { renderToStaticMarkup } from 'react-dom/server'
import { BillPage, BillPageProps } from '../components/BillPage'


export const html = {
	/**
	 * Renders the upload page, with the result of a run when there is one.
	 */
	renderBillPage(props: BillPageProps = {}): string {
		const component = React.createElement(BillPage, props)
		return `<!DOCTYPE html>${renderToStaticMarkup(component)}`
	},
}
