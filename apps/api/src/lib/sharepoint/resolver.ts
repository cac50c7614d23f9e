import { ResolutionError } from './errors.js'
import { DriveListSchema, SiteResponseSchema } from './schemas.js'
import { DEFAULT_LIBRARY_NAME, type DriveId, type SiteId, type Transport } from './types.js'

/**
 * Look up a site by `{tenantId}.sharepoint.com:/sites/{siteName}`
 */
export async function resolveSite(transport: Transport, tenantId: string, siteName: string): Promise<SiteId> {
  console.log(`[RESOLVER] Getting site ID for: ${siteName}`)

  const response = await transport.execute(
    'GET',
    `/sites/${tenantId}.sharepoint.com:/sites/${encodeURIComponent(siteName)}`
  )
  const parsed = SiteResponseSchema.safeParse(response)
  const siteId = parsed.success ? parsed.data.id : undefined

  if (!siteId) {
    console.error(`[RESOLVER] Failed to retrieve site ID. Response: ${JSON.stringify(response, null, 2)}`)
    const errorMessage =
      (parsed.success ? parsed.data.error?.message : undefined) ?? 'No specific error message provided'
    throw new ResolutionError(
      `Could not retrieve site ID for ${siteName}. Error: ${errorMessage}. Response: ${JSON.stringify(response)}`,
      { response }
    )
  }

  console.log(`[RESOLVER] Retrieved site ID: ${siteId}`)
  return siteId
}

/**
 * Pick the drive named `libraryName`, falling back to the default "Documents" library
 */
export async function resolveDrive(transport: Transport, siteId: SiteId, libraryName: string): Promise<DriveId> {
  console.log(`[RESOLVER] Getting drive ID for document library: ${libraryName}`)

  const response = await transport.execute('GET', `/sites/${siteId}/drives`)
  const parsed = DriveListSchema.safeParse(response)
  const drives = parsed.success ? parsed.data.value : []

  const availableDrives = drives.flatMap((drive) => (drive.name === undefined ? [] : [drive.name]))
  console.log(`[RESOLVER] Available drives: ${JSON.stringify(availableDrives)}`)

  const match = drives.find((drive) => drive.name === libraryName && drive.id)
  if (match?.id) {
    console.log(`[RESOLVER] Found drive ID for ${libraryName}: ${match.id}`)
    return match.id
  }

  console.warn(`[RESOLVER] Document library '${libraryName}' not found. Trying to get default document library.`)

  const fallback = drives.find((drive) => drive.name === DEFAULT_LIBRARY_NAME && drive.id)
  if (fallback?.id) {
    console.log(`[RESOLVER] Found default drive ID: ${fallback.id}`)
    return fallback.id
  }

  console.error(`[RESOLVER] Failed to find drive. Response data: ${JSON.stringify(response, null, 2)}`)
  const available = availableDrives.length > 0 ? availableDrives.join(', ') : 'No drives found'
  throw new ResolutionError(
    `Could not find drive for document library: ${libraryName}. Available drives: ${available}`,
    { response, availableDrives }
  )
}
