import { z } from 'zod'

export const DownloadEngineSchema = z.enum(['native', 'accelerated', 'stream'])

export const RegionSchema = z.enum(['global', 'cn'])

export const ThemeValueSchema = z.enum(['light', 'dark', 'system'])

export const CookieSourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({
    type: z.literal('browser'),
    browser: z.string().trim().toLowerCase().min(1, 'Browser name is required.'),
    profile: z.string().optional()
  }),
  z.object({ type: z.literal('file') })
])

export const DownloadOptionsSchema = z
  .object({
    url: z.string().trim().min(1, 'URL is required.'),
    engine: DownloadEngineSchema.default('native'),
    downloadDir: z.string().trim().min(1, 'Download directory is required.'),
    threadCount: z.number().int().min(1).default(8),
    cookieSource: CookieSourceSchema.default({ type: 'none' }),
    cookiePath: z
      .string()
      .trim()
      .optional()
      .transform((value) => (value ? value : undefined))
  })
  .refine((options) => options.cookieSource.type !== 'file' || Boolean(options.cookiePath), {
    message: 'A cookie file is required when the cookie source is "file".',
    path: ['cookiePath']
  })

export const AppSettingsSchema = z.object({
  language: z.string(),
  theme: ThemeValueSchema,
  downloadDir: z.string(),
  cookiePath: z.string(),
  // 'none', 'file' or a browser setting such as 'chrome' / 'firefox:default-release'
  cookieSource: z.string(),
  threadCount: z.number().int().min(1).max(64),
  engine: DownloadEngineSchema,
  region: RegionSchema
})

export type AppSettings = z.infer<typeof AppSettingsSchema>

export const ReleaseAssetSchema = z.object({
  name: z.string().min(1),
  browser_download_url: z.url(),
  size: z.number().int().nonnegative().optional(),
  digest: z.string().nullable().optional()
})

export const ReleaseIndexSchema = z.object({
  tag_name: z.string().optional(),
  assets: z.array(z.unknown())
})

export const CookieCacheEntrySchema = z.object({
  filePath: z.string(),
  mtimeMs: z.number(),
  host: z.string(),
  maxLength: z.number().int(),
  header: z.string(),
  matched: z.number().int().nonnegative().default(0),
  truncated: z.boolean().default(false)
})

export const PersistedCookieCacheSchema = z.object({
  version: z.literal(1),
  updatedAt: z.number(),
  encryptedEntries: z.string()
})
