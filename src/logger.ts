/**
 * Console logger tagged with the component name, e.g. `[RunBuilder] ...`
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void
}

export function createLogger(scope: string, debugEnabled: boolean): Logger {
  const prefix = `[${scope}]`
  return {
    debug(message, ...details) {
      if (debugEnabled) {
        console.debug(prefix, message, ...details)
      }
    },
  }
}
