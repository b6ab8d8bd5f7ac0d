/**
 * Render a report to the terminal and resolve once Ink has exited
 */

import React from 'react'
import { render } from 'ink'
import { Report, type ReportProps } from './Report.tsx'

export async function renderReport(props: ReportProps): Promise<void> {
  const { waitUntilExit } = render(<Report {...props} />)
  await waitUntilExit()
}

export { Report }
export type { ReportProps }
