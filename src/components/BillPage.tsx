import React from 'react'
import { PipelineOutcome, PipelineStage } from '../types/bills'
import { STAGES, STAGE_CAPTIONS } from '../config/constants'

export interface BillPageProps {
	upload?: {
		fileName: string
		previewUrl: string
	}
	outcome?: PipelineOutcome
	/** Stages reached before a capability error, when there is no outcome */
	trace?: PipelineStage[]
	error?: {
		stage?: string
		message: string
	}
}

type StageStatus = 'done' | 'failed' | 'pending'

const STATUS_MARK: Record<StageStatus, string> = {
	done: '✓',
	failed: '✗',
	pending: '·',
}

const STATUS_CLASS: Record<StageStatus, string> = {
	done: 'text-success',
	failed: 'text-danger',
	pending: 'text-muted',
}

const FAILURE_MESSAGES = {
	classification: 'Could not determine the bill type or party name. The AI might have had trouble reading the image.',
	extraction: 'Could not extract detailed data from the bill. Please check the image quality.',
}

/**
 * Stage list for the progress panel. The stage right after the last one
 * reached is the one that failed, if the run failed.
 */
export const stageStatuses = (
	trace: PipelineStage[],
	failed: boolean
): { stage: PipelineStage, status: StageStatus }[] =>
	STAGES.map((stage, index) => ({
		stage,
		status: trace.includes(stage)
			? 'done'
			: failed && index === trace.length ? 'failed' : 'pending',
	}))

const StageList: React.FC<{ trace: PipelineStage[], failed: boolean }> = ({ trace, failed }) => (
	<ul className="list-unstyled stages">
		{stageStatuses(trace, failed).map(({ stage, status }) => (
			<li key={stage} className={STATUS_CLASS[status]} data-status={status}>
				<span className="me-2">{STATUS_MARK[status]}</span>
				{STAGE_CAPTIONS[stage]}
			</li>
		))}
	</ul>
)

const RecordTable: React.FC<{ record: Record<string, string> }> = ({ record }) => (
	<table className="table table-sm table-bordered">
		<tbody>
			{Object.entries(record).map(([field, value]) => (
				<tr key={field}>
					<th scope="row">{field}</th>
					<td>{value}</td>
				</tr>
			))}
		</tbody>
	</table>
)

const ArchiveLink: React.FC<{ url: string }> = ({ url }) => (
	<p>
		<b>Image successfully filed in the archive.</b>{' '}
		<a href={url} target="_blank" rel="noreferrer">View File</a>
	</p>
)

const Outcome: React.FC<{ outcome: PipelineOutcome }> = ({ outcome }) => {
	if (outcome.status === 'done') {
		const { classification, archiveUrl, record, ledgerRow } = outcome
		return (
			<section className="outcome">
				<div className="alert alert-info">
					Detected <b>{classification.billCategory}</b> for party: <b>{classification.partyName}</b>
				</div>
				<div className="alert alert-success">Process Complete!</div>
				<ArchiveLink url={archiveUrl} />
				<p>
					Recorded in sheet <b>{ledgerRow.table}</b>, row {ledgerRow.rowNumber}.
				</p>
				<h5>Extracted Data</h5>
				<RecordTable record={record} />
			</section>
		)
	}

	return (
		<section className="outcome">
			{outcome.classification && (
				<div className="alert alert-info">
					Detected <b>{outcome.classification.billCategory}</b> for party: <b>{outcome.classification.partyName}</b>
				</div>
			)}
			{outcome.archiveUrl && <ArchiveLink url={outcome.archiveUrl} />}
			<div className="alert alert-danger">{FAILURE_MESSAGES[outcome.stage]}</div>
			<p className="small text-muted">{outcome.reason}</p>
			<label className="form-label" htmlFor="raw-response">Model raw response</label>
			<textarea id="raw-response" className="form-control font-monospace" rows={6} readOnly value={outcome.raw} />
		</section>
	)
}

export const BillPage: React.FC<BillPageProps> = ({ upload, outcome, trace, error }) => {
	const stagesReached = outcome?.trace ?? trace
	const failed = outcome?.status === 'failed' || Boolean(error)

	return (
		<html lang="en">
			<head>
				<meta charSet="UTF-8" />
				<meta name="viewport" content="width=device-width, initial-scale=1" />
				<title>Commodity Bill Processor</title>
				<link
					rel="stylesheet"
					href="https://cdn.jsdelivr.net/npm/bootstrap@5.3.2/dist/css/bootstrap.min.css"
					integrity="sha384-T3c6CoIi6uLrA9TneNEoa7RxnatzjcDSCmG1MXxSR1GAsXEV/Dwwykc2MPK8M2HN"
					crossOrigin="anonymous"
				/>
			</head>
			<body>
				<main className="container py-4" style={{ maxWidth: 720 }}>
					<h2>Loading/Unloading Bill Processor</h2>
					<p className="text-muted">
						Upload a Loading or Unloading Bill to automatically extract data, file the image, and update the ledger.
					</p>

					<form method="post" action="/" encType="multipart/form-data" className="mb-4">
						<input
							className="form-control mb-2"
							type="file"
							name="file"
							accept=".jpg,.jpeg,.png,image/jpeg,image/png"
							required
						/>
						<button className="btn btn-primary" type="submit">Process bill</button>
					</form>

					{upload && (
						<figure>
							<img src={upload.previewUrl} alt="Uploaded Bill" width={300} />
							<figcaption className="small text-muted">{upload.fileName}</figcaption>
						</figure>
					)}

					{stagesReached && <StageList trace={stagesReached} failed={failed} />}

					{outcome && <Outcome outcome={outcome} />}

					{error && (
						<div className="alert alert-danger">
							{error.stage ? `Processing stopped at ${error.stage}: ` : ''}{error.message}
						</div>
					)}
				</main>
			</body>
		</html>
	)
}
