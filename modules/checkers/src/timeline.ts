import { faultWindowsOf, History, Operation } from 'core-types'
import * as fse from 'fs-extra'
import { sortBy } from 'misc'
import * as path from 'path'

import { Checker } from './checker'

export const TIMELINE_FILE = 'timeline.html'

const ESCAPES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#39;' }

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, c => ESCAPES[c] ?? c)
}

function ms(nanos: number) {
  return (nanos / 1e6).toFixed(1)
}

function formatValue(op: Operation) {
  if (op.value === null) {
    return 'nil'
  }
  return Array.isArray(op.value) ? `[${op.value.join(' ')}]` : String(op.value)
}

function row(op: Operation) {
  const cells = [
    String(op.index),
    String(op.process),
    op.f,
    op.key === null ? '' : String(op.key),
    formatValue(op),
    op.outcome,
    ms(op.invokeTime),
    ms(op.completeTime - op.invokeTime),
    op.error ?? '',
  ]
  const cls = op.process === 'nemesis' ? 'nemesis' : op.outcome
  return `<tr class="${cls}">${cells.map(c => `<td>${escapeHtml(c)}</td>`).join('')}</tr>`
}

/**
 * Renders a history as a self-contained HTML page: one row per operation in invocation order, colored by outcome, with
 * the fault windows listed on top.
 */
export function renderTimeline(history: History, title: string): string {
  const windows = faultWindowsOf(history)
    .map(w => `<li>${ms(w.startTime)} ms, for ${ms(w.duration)} ms</li>`)
    .join('\n')
  const rows = sortBy(history, op => op.invokeTime).map(row).join('\n')
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>
body { font-family: monospace; }
td { padding: 0 8px; }
tr.ok { background: #dfd; }
tr.fail { background: #fdd; }
tr.info { background: #ffd; }
tr.nemesis { background: #ddf; }
</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
<h2>Fault windows</h2>
<ul>
${windows}
</ul>
<table>
<tr><th>#</th><th>process</th><th>f</th><th>key</th><th>value</th><th>outcome</th><th>invoked (ms)</th><th>latency (ms)</th><th>error</th></tr>
${rows}
</table>
</body>
</html>
`
}

/**
 * Writes the timeline of the history into the run directory. Never affects validity.
 */
export function timeline(): Checker {
  return {
    async check({ history, runDir }) {
      if (!runDir) {
        return { valid: true, message: 'no run directory, timeline not written' }
      }
      const file = path.join(runDir, TIMELINE_FILE)
      await fse.writeFile(file, renderTimeline(history, path.basename(runDir)))
      return { valid: true, details: { file } }
    },
  }
}
