/**
 * Run Logger
 *
 * One ScrapeRun per pipeline invocation: opened at start, finalized once at
 * the end. Completion is also emitted as a structured log event.
 */

import type { ILogger } from '@fairway/logger'
import type { CatalogStore } from '../catalog/store.js'
import type { ScrapeRun, ScrapeType, TerminalRunStatus } from '../catalog/types.js'

/** Error share above which a completed run raises an alert event */
const ERROR_RATE_ALERT_THRESHOLD = 0.5
const MIN_ITEMS_FOR_ALERT = 20

export interface RunTally {
  recordsAdded: number
  recordsUpdated: number
  errors: number

  /** Items attempted, for the error-rate alert */
  attempted: number

  /** Set when the run stopped before finishing */
  abortReason?: string | null
}

/**
 * failed: the run aborted; partial: it finished with errors; success otherwise.
 */
export function deriveRunStatus(tally: Pick<RunTally, 'errors' | 'abortReason'>): TerminalRunStatus {
  if (tally.abortReason) return 'failed'
  return tally.errors > 0 ? 'partial' : 'success'
}

export interface RunLoggerOptions {
  store: CatalogStore
  logger: ILogger
  now?: () => Date
}

export class RunLogger {
  private readonly store: CatalogStore
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(options: RunLoggerOptions) {
    this.store = options.store
    this.log = options.logger
    this.now = options.now ?? (() => new Date())
  }

  async open(sourceName: string, scrapeType: ScrapeType): Promise<ScrapeRun> {
    const run = await this.store.openRun({ sourceName, scrapeType, startedAt: this.now() })
    this.log.info('Scrape run started', { runId: run.id, source: sourceName, scrapeType })
    return run
  }

  async finalize(run: ScrapeRun, tally: RunTally): Promise<{ run: ScrapeRun; status: TerminalRunStatus }> {
    const status = deriveRunStatus(tally)
    const completedAt = this.now()

    const errorMessage =
      status === 'failed'
        ? (tally.abortReason ?? 'Run aborted')
        : status === 'partial'
          ? `${tally.errors} item(s) failed`
          : null

    const finalized = await this.store.finalizeRun(run.id, {
      status,
      recordsAdded: tally.recordsAdded,
      recordsUpdated: tally.recordsUpdated,
      errorMessage,
      completedAt,
    })

    this.recordRunCompleted(finalized, tally)
    return { run: finalized, status }
  }

  private recordRunCompleted(run: ScrapeRun, tally: RunTally): void {
    const errorRate = tally.attempted > 0 ? tally.errors / tally.attempted : 0

    const payload = {
      event_name: 'SCRAPE_RUN_COMPLETED',
      runId: run.id,
      source: run.sourceName,
      scrapeType: run.scrapeType,
      status: run.status,
      recordsAdded: run.recordsAdded,
      recordsUpdated: run.recordsUpdated,
      errors: tally.errors,
      attempted: tally.attempted,
      errorRate,
      durationMs: (run.completedAt ?? this.now()).getTime() - run.startedAt.getTime(),
    }

    if (run.status === 'failed') {
      this.log.error('SCRAPE_RUN_COMPLETED', { ...payload, errorMessage: run.errorMessage })
    } else {
      this.log.info('SCRAPE_RUN_COMPLETED', payload)
    }

    if (tally.attempted >= MIN_ITEMS_FOR_ALERT && errorRate > ERROR_RATE_ALERT_THRESHOLD) {
      this.log.warn('SCRAPE_ALERT_HIGH_ERROR_RATE', {
        event_name: 'SCRAPE_ALERT_HIGH_ERROR_RATE',
        runId: run.id,
        source: run.sourceName,
        errorRate,
        attempted: tally.attempted,
      })
    }
  }
}
