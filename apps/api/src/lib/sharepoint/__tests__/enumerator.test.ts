import { describe, it, expect } from 'vitest'
import { listDocuments } from '../enumerator.js'
import { ListingError } from '../errors.js'
import {
  createFakeTransport,
  driveTree,
  fileItem,
  folderItem,
  TEST_DRIVE_ID,
  TEST_SITE_ID,
} from '../../../test/factories.js'

const ROOT = `/sites/${TEST_SITE_ID}/drives/${TEST_DRIVE_ID}/root`

describe('listDocuments', () => {
  it('lists root files before files in subfolders', async () => {
    const { transport } = createFakeTransport(
      driveTree({
        '': [folderItem('sub'), fileItem('a.txt')],
        sub: [fileItem('b.txt')],
      })
    )

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(documents.map(({ name, path }) => ({ name, path }))).toEqual([
      { name: 'a.txt', path: '' },
      { name: 'b.txt', path: 'sub' },
    ])
  })

  it('builds full records from file entries', async () => {
    const { transport } = createFakeTransport(driveTree({ '': [fileItem('report.pdf', { size: 2048 })] }))

    const [document] = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(document).toEqual({
      id: 'item-report.pdf',
      name: 'report.pdf',
      path: '',
      sizeBytes: 2048,
      webUrl: 'https://contoso.sharepoint.com/sites/Finance/Reports/report.pdf',
    })
    expect(Object.isFrozen(document)).toBe(true)
  })

  it('requests one page of selected fields per folder', async () => {
    const { transport, execute } = createFakeTransport(
      driveTree({
        '': [folderItem('2024')],
        '2024': [folderItem('Q1')],
        '2024/Q1': [],
      })
    )

    await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    const query = { $select: 'id,name,size,webUrl,file,folder', $top: 1000 }
    expect(execute.mock.calls).toEqual([
      ['GET', `${ROOT}/children`, query],
      ['GET', `${ROOT}:/2024:/children`, query],
      ['GET', `${ROOT}:/2024/Q1:/children`, query],
    ])
  })

  it('visits subfolders depth-first in API order', async () => {
    const { transport } = createFakeTransport(
      driveTree({
        '': [folderItem('x'), fileItem('root.txt'), folderItem('y')],
        x: [folderItem('deep'), fileItem('x1.txt')],
        'x/deep': [fileItem('deep.txt')],
        y: [fileItem('y1.txt')],
      })
    )

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(documents.map((d) => `${d.path}|${d.name}`)).toEqual([
      '|root.txt',
      'x|x1.txt',
      'x/deep|deep.txt',
      'y|y1.txt',
    ])
  })

  it('starts from a subfolder when a path is given', async () => {
    const { transport } = createFakeTransport(
      driveTree({
        'Shared Reports': [fileItem('q.xlsx')],
      })
    )

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID, 'Shared Reports')

    expect(documents).toHaveLength(1)
    expect(documents[0].path).toBe('Shared Reports')
  })

  it('encodes folder path segments', async () => {
    const { transport, execute } = createFakeTransport(driveTree({ 'Board Minutes/2024': [] }))

    await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID, 'Board Minutes/2024')

    expect(execute.mock.calls[0][1]).toBe(`${ROOT}:/Board%20Minutes/2024:/children`)
  })

  it('fills missing file fields with defaults', async () => {
    const { transport } = createFakeTransport(driveTree({ '': [{ name: 'orphan.txt', file: {} }] }))

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(documents).toEqual([{ id: '', name: 'orphan.txt', path: '', sizeBytes: 0, webUrl: '' }])
  })

  it('skips folders without a name instead of listing the parent again', async () => {
    const { transport, execute } = createFakeTransport(
      driveTree({ '': [{ id: 'folder-x', folder: { childCount: 2 } }, fileItem('a.txt')] })
    )

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(documents.map((d) => d.name)).toEqual(['a.txt'])
    expect(execute).toHaveBeenCalledTimes(1)
    expect(console.warn).toHaveBeenCalledWith(
      "[ENUMERATOR] Skipping folder without a name in 'root' (ID: folder-x)"
    )
  })

  it('ignores entries that are neither files nor folders', async () => {
    const { transport } = createFakeTransport(driveTree({ '': [{ id: 'pkg', name: 'Notebook' }, fileItem('a.txt')] }))

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(documents.map((d) => d.name)).toEqual(['a.txt'])
  })

  it('fails on an embedded API error instead of returning an empty folder', async () => {
    const { transport } = createFakeTransport(() => ({ error: { code: 'accessDenied', message: 'Access denied' } }))

    const error = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ListingError)
    expect(error).toHaveProperty('message', 'Failed to list documents: Access denied')
  })

  it('uses a placeholder when the embedded error has no message', async () => {
    const { transport } = createFakeTransport(() => ({ error: {} }))

    await expect(listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)).rejects.toThrow(
      'Failed to list documents: Unknown error'
    )
  })

  it('fails on a response that is not a listing', async () => {
    const { transport } = createFakeTransport(() => 'not json')

    await expect(listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)).rejects.toBeInstanceOf(ListingError)
  })

  it('warns when a folder has more children than one page', async () => {
    const { transport } = createFakeTransport(() => ({
      value: [fileItem('a.txt')],
      '@odata.nextLink': 'https://graph.microsoft.com/v1.0/next-page',
    }))

    const documents = await listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)

    expect(documents).toHaveLength(1)
    expect(console.warn).toHaveBeenCalledWith(
      "[ENUMERATOR] Folder 'root' has more than 1000 entries; entries beyond the first page are omitted"
    )
  })

  it('propagates transport failures', async () => {
    const { transport } = createFakeTransport(driveTree({ '': [folderItem('gone')] }))

    await expect(listDocuments(transport, TEST_SITE_ID, TEST_DRIVE_ID)).rejects.toThrow("No fixture for folder 'gone'")
  })
})
