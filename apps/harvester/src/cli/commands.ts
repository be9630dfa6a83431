/**
 * Harvester CLI commands
 *
 * Each command returns the process exit code. Output goes through `print`
 * so commands can be exercised without a terminal.
 */

import { NotFoundError, type DealcheckStore, type PipelineRun } from '@dealcheck/db'
import { formatCalibrationReport, runCalibration } from '../calibration'
import type { HarvesterEnv } from '../config/env'
import { runPipeline, type PipelineAlerts } from '../pipeline/run-pipeline'
import { reviewMatch } from '../resolver'
import { loadSources } from '../sources/registry'

export const USAGE = [
  'Dealcheck Harvester',
  '',
  'Usage:',
  '  harvester migrate                        - Apply pending database migrations',
  '  harvester run                            - Ingest every configured source and score the offers',
  '  harvester status                         - Show the latest pipeline run',
  '  harvester calibrate <labels.csv>         - Compare human labels with the latest predictions',
  '  harvester review                         - List matches waiting for review',
  '  harvester review <matchId> confirm|reject - Confirm or reject a match',
].join('\n')

const PENDING_REVIEW_LIMIT = 100

export interface CommandDeps {
  store: DealcheckStore
  env: HarvesterEnv
  migrate: () => Promise<string[]>
  print: (text: string) => void
  alerts?: PipelineAlerts
}

export function formatRun(run: PipelineRun): string {
  const lines = [
    `Run ${run.id}: ${run.status}`,
    `  started:   ${run.startedAt.toISOString()}`,
    `  finished:  ${run.finishedAt.toISOString()}`,
    `  scoring:   ${run.scoringVersion}`,
    `  offers: ${run.totalOffers}  snapshots: ${run.totalSnapshots}  deduplicated: ${run.totalDeduplicated}` +
      `  evaluations: ${run.totalEvaluations}  pending review: ${run.totalPendingReview}  offer errors: ${run.totalOfferErrors}`,
    '  sources:',
    ...Object.entries(run.sources).map(
      ([domain, s]) => `    ${domain} (${s.name}): ${s.source} ${s.count}${s.error ? ` - ${s.error}` : ''}`
    ),
  ]
  if (run.errorMessage) lines.push(`  error: ${run.errorMessage}`)
  return lines.join('\n')
}

async function review(args: string[], deps: CommandDeps): Promise<number> {
  const [matchIdArg, decision] = args

  if (matchIdArg === undefined) {
    const pending = await deps.store.productMatches.listPendingReview(PENDING_REVIEW_LIMIT)
    if (pending.length === 0) {
      deps.print('No matches pending review')
      return 0
    }
    for (const match of pending) {
      deps.print(
        `#${match.matchId} [${match.matchConfidence.toFixed(4)}] ${match.retailerName}: ${match.title} -> ${match.canonicalName} (canonical ${match.productCanonicalId})`
      )
    }
    return 0
  }

  const matchId = Number(matchIdArg)
  if (!Number.isInteger(matchId) || matchId <= 0 || (decision !== 'confirm' && decision !== 'reject')) {
    deps.print('Usage: harvester review <matchId> confirm|reject')
    return 2
  }

  try {
    const updated = await reviewMatch(deps.store, matchId, decision)
    deps.print(`Match #${updated.id} is now ${updated.status}`)
    return 0
  } catch (error) {
    if (error instanceof NotFoundError) {
      deps.print(error.message)
      return 1
    }
    throw error
  }
}

export async function runCommand(argv: string[], deps: CommandDeps): Promise<number> {
  const [command, ...args] = argv

  switch (command) {
    case 'migrate': {
      const applied = await deps.migrate()
      deps.print(applied.length > 0 ? `Applied: ${applied.join(', ')}` : 'Database is up to date')
      return 0
    }

    case 'run': {
      const sources = await loadSources(deps.env.SOURCES_CONFIG, { timeoutMs: deps.env.SOURCE_TIMEOUT_MS })
      const run = await runPipeline({
        store: deps.store,
        sources,
        scoringVersion: deps.env.SCORING_VERSION,
        alerts: deps.alerts,
      })
      deps.print(formatRun(run))
      return run.status === 'SUCCESS' ? 0 : 1
    }

    case 'status': {
      const run = await deps.store.pipelineRuns.findLatest()
      deps.print(run ? formatRun(run) : 'No pipeline run recorded yet')
      return 0
    }

    case 'calibrate': {
      const [csvPath] = args
      if (!csvPath) {
        deps.print('Usage: harvester calibrate <labels.csv>')
        return 2
      }
      const { report, sweep } = await runCalibration(deps.store, csvPath, { scoringVersion: deps.env.SCORING_VERSION })
      deps.print(formatCalibrationReport(report, sweep))
      return 0
    }

    case 'review':
      return review(args, deps)

    default:
      deps.print(USAGE)
      return command === undefined || command === 'help' ? 0 : 2
  }
}
