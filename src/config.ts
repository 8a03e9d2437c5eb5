import { z } from 'zod'

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // What remove() does with an unknown sequence id
  missingRemoval: z.enum(['error', 'ignore']).default('error'),

  // Freeze run snapshots handed out by AttributedText
  freezeSnapshots: z.boolean().default(true),

  // Emit debug log lines
  debug: z.boolean().default(false),
})

export type Config = z.infer<typeof configSchema>

export type ConfigOptions = z.input<typeof configSchema>

type Env = Record<string, string | undefined>

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  return value === '1' || value.toLowerCase() === 'true'
}

/**
 * Load and validate configuration
 *
 * Explicit options win over environment variables, which win over the
 * schema defaults.
 */
export function loadConfig(options: ConfigOptions = {}, env: Env = process.env): Config {
  const raw = {
    missingRemoval: options.missingRemoval ?? (env.SPANSTYLE_MISSING_REMOVAL || undefined),
    freezeSnapshots: options.freezeSnapshots ?? parseFlag(env.SPANSTYLE_FREEZE_SNAPSHOTS),
    debug: options.debug ?? parseFlag(env.SPANSTYLE_DEBUG),
  }

  return configSchema.parse(raw)
}
