import { z } from 'zod'

const oauthClientSchema = z.object({
  client_id: z.string().min(1, 'client_id is required'),
  client_secret: z.string().min(1, 'client_secret is required'),
  redirect_uris: z.array(z.string()).optional(),
})

// Private keys pasted into CI secrets often arrive with literal "\n" sequences
function normalizePrivateKey(key: string): string {
  if (key.includes('\\n') && !key.includes('\n')) {
    return key.replace(/\\n/g, '\n')
  }
  return key
}

/**
 * credentials.json: the OAuth client downloaded from the Google Cloud console
 * ("installed" or "web" application), or a service account key.
 */
export const credentialsSchema = z.union([
  z.object({ installed: oauthClientSchema }).transform(({ installed }) => ({
    kind: 'oauth' as const,
    clientId: installed.client_id,
    clientSecret: installed.client_secret,
    redirectUri: installed.redirect_uris?.[0],
  })),
  z.object({ web: oauthClientSchema }).transform(({ web }) => ({
    kind: 'oauth' as const,
    clientId: web.client_id,
    clientSecret: web.client_secret,
    redirectUri: web.redirect_uris?.[0],
  })),
  z
    .object({
      type: z.literal('service_account'),
      client_email: z.string().email('client_email must be an email address'),
      private_key: z.string().min(1, 'private_key is required'),
      project_id: z.string().optional(),
    })
    .transform((account) => ({
      kind: 'service_account' as const,
      clientEmail: account.client_email,
      privateKey: normalizePrivateKey(account.private_key),
      projectId: account.project_id,
    })),
])

export type GoogleCredentials = z.output<typeof credentialsSchema>

function parseExpiry(value: string | undefined): number | undefined {
  if (!value) return undefined
  const parsed = Date.parse(value)
  return Number.isNaN(parsed) ? undefined : parsed
}

/**
 * token.json: an authorized-user token. Both the `token` / `expiry` (ISO
 * string) layout and the `access_token` / `expiry_date` (epoch ms) layout
 * are accepted.
 */
export const tokenSchema = z
  .object({
    token: z.string().optional(),
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    expiry: z.string().optional(),
    expiry_date: z.number().optional(),
  })
  .refine((token) => Boolean(token.refresh_token || token.access_token || token.token), {
    message: 'token must contain refresh_token or an access token',
  })
  .transform((token) => ({
    accessToken: token.access_token ?? token.token,
    refreshToken: token.refresh_token,
    expiryDate: token.expiry_date ?? parseExpiry(token.expiry),
  }))

export type StoredToken = z.output<typeof tokenSchema>

export const calendarIdSchema = z.string().trim().min(1, 'calendar_id must not be empty')

export const scrapeUrlSchema = z
  .string()
  .trim()
  .url('url must be an absolute URL')
  .refine((value) => /^https?:\/\//i.test(value), { message: 'url must use http or https' })

const staffNamesSchema = z.array(z.string().trim().min(1, 'staff names must not be empty'))

export const workScheduleSchema = z.record(
  z.string(),
  z.record(z.string(), z.record(z.string(), staffNamesSchema))
)
