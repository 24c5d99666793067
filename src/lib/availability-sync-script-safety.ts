const TRUTHY = new Set(['1', 'true', 'yes', 'on'])

export const AVAILABILITY_SYNC_SCRIPT = 'sync-availability'
export const AVAILABILITY_SYNC_MUTATION_ENV = 'ALLOW_AVAILABILITY_SYNC_MUTATION'
export const DAYS_AHEAD_HARD_CAP = 60

function isTruthyEnv(value: string | undefined): boolean {
  if (!value) {
    return false
  }
  return TRUTHY.has(value.trim().toLowerCase())
}

export function assertScriptMutationAllowed(params: {
  scriptName: string
  envVar: string
}): void {
  if (isTruthyEnv(process.env[params.envVar])) {
    return
  }

  throw new Error(
    `${params.scriptName} blocked by safety guard. Set ${params.envVar}=true to run this mutation script.`
  )
}

export function assertAvailabilitySyncMutationAllowed(): void {
  assertScriptMutationAllowed({
    scriptName: AVAILABILITY_SYNC_SCRIPT,
    envVar: AVAILABILITY_SYNC_MUTATION_ENV,
  })
}

export function resolveDaysAhead(raw: string | null): number | null {
  if (raw === null || raw.trim().length === 0) {
    return null
  }

  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`[${AVAILABILITY_SYNC_SCRIPT}] Invalid --days "${raw}". Provide a whole number of days.`)
  }

  const parsed = Number.parseInt(trimmed, 10)
  if (!Number.isInteger(parsed) || parsed > DAYS_AHEAD_HARD_CAP) {
    throw new Error(
      `[${AVAILABILITY_SYNC_SCRIPT}] --days ${trimmed} exceeds hard cap ${DAYS_AHEAD_HARD_CAP}.`
    )
  }

  return parsed
}

function findFlagValue(argv: string[], flag: string): string | null {
  const withEqualsPrefix = `${flag}=`
  for (let i = 0; i < argv.length; i += 1) {
    const entry = argv[i]
    if (entry === flag) {
      const next = argv[i + 1]
      return typeof next === 'string' ? next : null
    }
    if (entry.startsWith(withEqualsPrefix)) {
      return entry.slice(withEqualsPrefix.length)
    }
  }
  return null
}

export type AvailabilitySyncArgs = {
  help: boolean
  confirm: boolean
  skipImport: boolean
  /** null means "use SYNC_DAYS_AHEAD" */
  daysAhead: number | null
}

export function parseAvailabilitySyncArgs(argv: string[] = process.argv): AvailabilitySyncArgs {
  const rest = argv.slice(2)

  if (rest.includes('--days') && findFlagValue(rest, '--days') === null) {
    throw new Error(`[${AVAILABILITY_SYNC_SCRIPT}] --days needs a value.`)
  }

  return {
    help: rest.includes('--help'),
    confirm: rest.includes('--confirm'),
    skipImport: rest.includes('--skip-import'),
    daysAhead: resolveDaysAhead(findFlagValue(rest, '--days')),
  }
}

export const AVAILABILITY_SYNC_USAGE = [
  `${AVAILABILITY_SYNC_SCRIPT} (read-only unless --confirm)`,
  '',
  'Usage:',
  `  tsx scripts/${AVAILABILITY_SYNC_SCRIPT}.ts [--confirm] [--days <n>] [--skip-import]`,
  '',
  'Options:',
  `  --confirm       Create calendar events (also requires ${AVAILABILITY_SYNC_MUTATION_ENV}=true)`,
  `  --days <n>      Days after today to check (default SYNC_DAYS_AHEAD, hard cap ${DAYS_AHEAD_HARD_CAP})`,
  '  --skip-import   Do not copy scraped room bookings into the calendar',
].join('\n')
