#!/usr/bin/env tsx

import path from 'path'
import { config } from 'dotenv'
import {
  AVAILABILITY_SYNC_MUTATION_ENV,
  AVAILABILITY_SYNC_SCRIPT,
  AVAILABILITY_SYNC_USAGE,
  assertAvailabilitySyncMutationAllowed,
  parseAvailabilitySyncArgs,
} from '@/lib/availability-sync-script-safety'
import { loadSyncConfig } from '@/lib/config/load-config'
import { getSyncEnv } from '@/lib/env'
import { GoogleCalendarGateway, createCalendarAuth } from '@/lib/google-calendar'
import { logger } from '@/lib/logger'
import { runAvailabilitySync } from '@/services/availability-sync'

function markFailure(message: string, error?: unknown) {
  process.exitCode = 1
  logger.error(`[${AVAILABILITY_SYNC_SCRIPT}] ${message}`, {
    error: error instanceof Error ? error : error === undefined ? undefined : new Error(String(error)),
  })
}

async function main() {
  config({ path: path.resolve(process.cwd(), '.env.local') })

  const args = parseAvailabilitySyncArgs(process.argv)
  if (args.help) {
    console.log(AVAILABILITY_SYNC_USAGE)
    return
  }

  if (args.confirm) {
    assertAvailabilitySyncMutationAllowed()
  }

  const env = getSyncEnv()
  const syncConfig = loadSyncConfig(env)

  const auth = createCalendarAuth({
    credentials: syncConfig.credentials,
    token: syncConfig.token,
    tokenFile: syncConfig.tokenFile,
  })
  const gateway = new GoogleCalendarGateway({
    auth,
    calendarId: syncConfig.calendarId,
    timeZone: env.SYNC_TIMEZONE,
  })

  const result = await runAvailabilitySync({
    config: syncConfig,
    env,
    gateway,
    dryRun: !args.confirm,
    importBookings: !args.skipImport,
    daysAhead: args.daysAhead ?? undefined,
  })

  if (!args.confirm) {
    const planned = (result.imported?.planned.length ?? 0) + result.sync.planned.length
    logger.info(
      `[${AVAILABILITY_SYNC_SCRIPT}] Read-only run: ${planned} event(s) would be created. Re-run with --confirm and ${AVAILABILITY_SYNC_MUTATION_ENV}=true to write them.`
    )
  }
}

main().catch((error: unknown) => markFailure('Availability sync failed', error))
