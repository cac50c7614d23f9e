import { ListingError } from './errors.js'
import { DriveItemListSchema, type DriveItem } from './schemas.js'
import type { DocumentRecord, DriveId, FolderTask, SiteId, Transport } from './types.js'

export const PAGE_SIZE = 1000
export const SELECTED_FIELDS = 'id,name,size,webUrl,file,folder'

function childrenEndpoint(siteId: SiteId, driveId: DriveId, folderPath: string): string {
  const root = `/sites/${siteId}/drives/${driveId}/root`
  if (!folderPath) {
    return `${root}/children`
  }
  const encoded = folderPath.split('/').map(encodeURIComponent).join('/')
  return `${root}:/${encoded}:/children`
}

function toDocumentRecord(item: DriveItem, folderPath: string): DocumentRecord {
  return Object.freeze({
    id: item.id ?? '',
    name: item.name ?? '',
    path: folderPath,
    sizeBytes: item.size ?? 0,
    webUrl: item.webUrl ?? '',
  })
}

async function listFolder(
  transport: Transport,
  siteId: SiteId,
  driveId: DriveId,
  folderPath: string
): Promise<DriveItem[]> {
  const label = folderPath || 'root'
  console.log(`[ENUMERATOR] Listing documents in folder: '${label}'`)

  const response = await transport.execute('GET', childrenEndpoint(siteId, driveId, folderPath), {
    $select: SELECTED_FIELDS,
    $top: PAGE_SIZE,
  })

  const parsed = DriveItemListSchema.safeParse(response)
  if (!parsed.success) {
    console.error(`[ENUMERATOR] Unexpected listing response for '${label}': ${parsed.error.message}`)
    throw new ListingError(`Failed to list documents: unexpected response for folder '${label}'`, folderPath)
  }

  const { error, value: items } = parsed.data
  if (error) {
    const message = error.message ?? 'Unknown error'
    console.error(`[ENUMERATOR] Error listing documents: ${message}`)
    throw new ListingError(`Failed to list documents: ${message}`, folderPath)
  }

  if (parsed.data['@odata.nextLink']) {
    console.warn(
      `[ENUMERATOR] Folder '${label}' has more than ${PAGE_SIZE} entries; entries beyond the first page are omitted`
    )
  }

  console.log(`[ENUMERATOR] Found ${items.length} items in folder '${label}'`)
  return items
}

/**
 * Flat list of every file under `folderPath`, depth-first.
 *
 * A folder's own files come before anything from its subfolders, and subfolders
 * are visited in the order the API returns them. Only the first PAGE_SIZE
 * children of each folder are read.
 */
export async function listDocuments(
  transport: Transport,
  siteId: SiteId,
  driveId: DriveId,
  folderPath = ''
): Promise<DocumentRecord[]> {
  const documents: DocumentRecord[] = []
  const pending: FolderTask[] = [{ path: folderPath }]

  let task = pending.pop()
  while (task) {
    const items = await listFolder(transport, siteId, driveId, task.path)
    const subfolders: FolderTask[] = []

    for (const item of items) {
      if (item.folder) {
        // A nameless folder would resolve to the current path and be listed again
        if (!item.name) {
          console.warn(`[ENUMERATOR] Skipping folder without a name in '${task.path || 'root'}' (ID: ${item.id ?? 'unknown'})`)
          continue
        }
        subfolders.push({ path: task.path ? `${task.path}/${item.name}` : item.name })
      } else if (item.file) {
        documents.push(toDocumentRecord(item, task.path))
      }
    }

    // Reversed so the first subfolder is popped next
    pending.push(...subfolders.reverse())
    task = pending.pop()
  }

  return documents
}
