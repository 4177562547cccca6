import {performance} from "node:perf_hooks"

export type PerformanceEntry = {
  duration: number
  startTime: number
  endTime: number
}

export type PerformanceSummary = Record<string, {avg: number; total: number; count: number}>

type LabeledEntry = PerformanceEntry & {label: string}

/**
 * Wall-clock timings of the compare pipeline, keyed by stage label. Timers
 * with the same label may nest; each `end` closes the latest `start`.
 */
export class PerformanceTracker {
  private readonly finished: LabeledEntry[] = []
  private readonly running = new Map<string, number[]>()

  start(label: string): void {
    const starts = this.running.get(label)
    if (starts) {
      starts.push(performance.now())
    } else {
      this.running.set(label, [performance.now()])
    }
  }

  end(label: string): void {
    const startTime = this.running.get(label)?.pop()
    if (startTime === undefined) {
      console.warn(`No running timer for "${label}"`)
      return
    }
    const endTime = performance.now()
    this.finished.push({label, startTime, endTime, duration: endTime - startTime})
  }

  measure<T>(label: string, fn: () => T): T {
    this.start(label)
    try {
      return fn()
    } finally {
      this.end(label)
    }
  }

  getEntries(label: string): PerformanceEntry[] {
    return this.finished
      .filter((entry) => entry.label === label)
      .map(({startTime, endTime, duration}) => ({startTime, endTime, duration}))
  }

  getSummary(): PerformanceSummary {
    const summary: PerformanceSummary = {}
    for (const {label, duration} of this.finished) {
      const stage = summary[label] ?? {avg: 0, total: 0, count: 0}
      stage.count += 1
      stage.total += duration
      stage.avg = stage.total / stage.count
      summary[label] = stage
    }
    return summary
  }

  /** Prints one table row per stage; prints nothing before any timing. */
  logSummary(title = "Compare timings:"): void {
    const rows = Object.entries(this.getSummary()).map(([stage, {avg, total, count}]) => ({
      stage,
      count,
      "avg (ms)": avg.toFixed(3),
      "total (ms)": total.toFixed(3),
    }))
    if (rows.length === 0) return
    console.log(title)
    console.table(rows)
  }

  clear(): void {
    this.finished.length = 0
    this.running.clear()
  }
}
