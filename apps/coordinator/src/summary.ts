import pc from 'picocolors'
import { formatMetrics } from '@datafaucet/pipeline-common'
import type { PipelineStatus } from './coordinator'
import { PipelineState } from './pipeline-unit'

type Colors = ReturnType<typeof pc.createColors>

const stateColor = (colors: Colors, state: PipelineState): ((text: string) => string) => {
  switch (state) {
    case PipelineState.Idle:
      return colors.green
    case PipelineState.Failed:
      return colors.red
    case PipelineState.Ticking:
    case PipelineState.Delivering:
      return colors.yellow
    case PipelineState.Stopped:
      return colors.gray
  }
}

/**
 * Renders the shutdown summary, one line per pipeline.
 * @param statuses Pipeline statuses from the coordinator handle.
 * @param useColors Whether to emit ANSI colors.
 */
export const formatSummary = (statuses: PipelineStatus[], useColors = pc.isColorSupported): string => {
  const colors = pc.createColors(useColors)
  const width = Math.max(0, ...statuses.map((status) => status.name.length))
  const lines = [colors.bold('Pipeline summary')]

  for (const status of statuses) {
    const name = status.name.padEnd(width)
    const kind = status.kind.padEnd(9)
    const state = stateColor(colors, status.state)(status.state.padEnd(10))
    const artifacts = status.kind === 'batch' ? ` artifacts=${status.artifacts}` : ''
    const lastError = status.lastError ? colors.red(` lastError=${JSON.stringify(status.lastError)}`) : ''
    lines.push(`  ${colors.cyan(name)} ${kind} ${state} ${formatMetrics(status.metrics)}${artifacts}${lastError}`)
  }

  return lines.join('\n')
}
