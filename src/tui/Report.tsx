/**
 * Effect Size Report
 * One-shot Ink view of an effect size and its interval
 */

import React, { useEffect } from 'react'
import { Box, Text, useApp } from 'ink'
import { classifyMagnitude, EFFECT_SIZE_LABELS, type EffectSize } from '../effect/effectSize.ts'
import { formatMagnitude, roundTo } from '../format/format.ts'

export interface ReportProps {
  /** Computed result */
  result: EffectSize
  /** Decimal places shown */
  precision: number
  /** Analysis name shown in the header */
  title?: string
  /** Free-text note shown under the title */
  description?: string
  /** Sample sizes shown under the header */
  sizes?: { treatment: number; control: number }
}

function Row({ label, value, color }: { label: string; value: string; color?: string }): React.ReactElement {
  return (
    <Box>
      <Box width={12}>
        <Text dimColor>{label}</Text>
      </Box>
      {color ? <Text color={color}>{value}</Text> : <Text>{value}</Text>}
    </Box>
  )
}

export function Report({
  result,
  precision,
  title,
  description,
  sizes
}: ReportProps): React.ReactElement {
  const { exit } = useApp()

  // Static report: leave after the first frame
  useEffect(() => {
    exit()
  }, [exit])

  const { interval } = result
  const magnitude = formatMagnitude(classifyMagnitude(result.estimate))
  const method =
    interval.method === 'bootstrap'
      ? `bootstrap, ${interval.resampleCount} resamples`
      : 'normal approximation'

  return (
    <Box flexDirection="column" borderStyle="single" paddingX={1}>
      <Text bold>{title ?? EFFECT_SIZE_LABELS[result.kind]}</Text>
      {description && <Text italic>{description}</Text>}
      {sizes && (
        <Text dimColor>
          n = {sizes.treatment} vs {sizes.control}
        </Text>
      )}
      <Row label="Measure" value={EFFECT_SIZE_LABELS[result.kind]} />
      <Row label="Estimate" value={String(roundTo(result.estimate, precision))} />
      <Row label="Magnitude" value={magnitude.text} color={magnitude.color} />
      <Row
        label="Interval"
        value={`[${roundTo(interval.lower, precision)}, ${roundTo(interval.upper, precision)}]`}
      />
      <Row label="Coverage" value={`${roundTo(interval.coverage * 100, 2)}%`} />
      <Row label="Method" value={method} />
    </Box>
  )
}
