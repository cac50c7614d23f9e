import { z } from 'zod'
import { DEFAULT_LIBRARY_NAME } from './types.js'

export const SiteIdSchema = z.string().brand<'SiteId'>()
export const DriveIdSchema = z.string().brand<'DriveId'>()

// Branded so that only a validated config reaches the catalog
export const ClientConfigSchema = z
  .object({
    tenantId: z
      .string({ required_error: 'SHAREPOINT_TENANT_ID environment variable must be set' })
      .trim()
      .min(1, 'SHAREPOINT_TENANT_ID environment variable must be set'),
    siteName: z
      .string({ required_error: 'SHAREPOINT_SITE_NAME environment variable must be set' })
      .trim()
      .min(1, 'SHAREPOINT_SITE_NAME environment variable must be set'),
    // Blank library names fall back to the default library
    libraryName: z
      .string()
      .optional()
      .transform((name) => name?.trim() || DEFAULT_LIBRARY_NAME),
  })
  .brand<'ClientConfig'>()

const GraphErrorSchema = z
  .object({
    code: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough()

export const SiteResponseSchema = z
  .object({
    id: SiteIdSchema.optional(),
    error: GraphErrorSchema.optional(),
  })
  .passthrough()

export const DriveListSchema = z.object({
  value: z
    .array(
      z
        .object({
          id: DriveIdSchema.optional(),
          name: z.string().optional(),
        })
        .passthrough()
    )
    .default([]),
})

export const DriveItemSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    size: z.number().optional(),
    webUrl: z.string().optional(),
    file: z.object({}).passthrough().optional(),
    folder: z.object({}).passthrough().optional(),
  })
  .passthrough()

export const DriveItemListSchema = z.object({
  value: z.array(DriveItemSchema).default([]),
  '@odata.nextLink': z.string().optional(),
  error: GraphErrorSchema.optional(),
})

export type DriveItem = z.infer<typeof DriveItemSchema>
