/**
 * Diagnostics go to stderr so stdout carries only the report.
 * Debug lines are printed when EFFECTSIZE_DEBUG=1.
 */

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.EFFECTSIZE_DEBUG === '1'
}

export function debug(scope: string, ...args: unknown[]): void {
  if (!isDebugEnabled()) return
  console.error(`[${scope}]`, ...args)
}

export function warn(scope: string, ...args: unknown[]): void {
  console.error(`[${scope}]`, ...args)
}
