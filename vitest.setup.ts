// Keep test runs independent of a developer's .env.local and CI secrets
for (const name of [
  'GOOGLE_CREDENTIALS',
  'GOOGLE_TOKEN',
  'GOOGLE_CALENDAR_ID',
  'SCRAPE_URL',
  'WORK_SCHEDULE',
  'ALLOW_AVAILABILITY_SYNC_MUTATION',
]) {
  delete process.env[name]
}

process.env.LOG_LEVEL = 'error'
