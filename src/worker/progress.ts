import type { ProgressEvent } from '../transfer/types.js'
import type { Progress } from '../state/types.js'

/**
 * Running totals for one in-flight operation. Never shared across
 * operations; the worker builds a fresh one per request.
 */
export class ProgressAggregator {
  private declared = 0
  private processed = 0

  apply(event: ProgressEvent): Progress {
    switch (event.type) {
      case 'DECLARED_SIZE':
        this.declared += event.size
        break
      case 'PROCESSED':
        this.processed += event.bytes
        break
      case 'DONE':
        this.processed = Math.max(this.processed, this.declared)
        break
    }
    return this.current()
  }

  current(): Progress {
    if (this.declared <= 0) return 'indeterminate'
    return Math.min(1, this.processed / this.declared)
  }
}

// Drains events in emission order until the channel closes.
export async function relayProgress(
  events: AsyncIterable<ProgressEvent>,
  aggregator: ProgressAggregator,
  report: (progress: Progress) => void
): Promise<void> {
  for await (const event of events) {
    report(aggregator.apply(event))
  }
}
