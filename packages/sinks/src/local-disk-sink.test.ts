import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { SinkDeliveryError, silentLogger } from '@datafaucet/common'
import { LocalDiskSink } from './local-disk-sink'

const records = [
  { timestamp: '2024-05-01T12:00:00.000+00:00', a: 1 },
  { timestamp: '2024-05-01T12:00:00.001+00:00', a: null },
]

describe('LocalDiskSink', () => {
  let tempDir: string
  let sink: LocalDiskSink | null = null

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'datafaucet-sink-'))
  })

  afterEach(async () => {
    await sink?.close()
    sink = null
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes one artifact per delivery and leaves no temp files', async () => {
    const folderPath = join(tempDir, 'nested', 'out')
    sink = new LocalDiskSink({ folderPath, filetype: 'json', logger: silentLogger })
    await sink.open()

    const location = await sink.deliver({
      pipelineName: 'batch_1',
      artifactId: 'batch_1_20240501T120000000Z',
      records,
    })

    expect(location).toBe(join(folderPath, 'batch_1_20240501T120000000Z.json'))
    expect(JSON.parse(await readFile(location, 'utf8'))).toEqual(records)
    expect(await readdir(folderPath)).toEqual(['batch_1_20240501T120000000Z.json'])
  })

  it('deletes artifacts and tolerates missing ones', async () => {
    sink = new LocalDiskSink({ folderPath: tempDir, filetype: 'csv', logger: silentLogger })
    await sink.open()
    const location = await sink.deliver({ pipelineName: 'b', artifactId: 'b_1', records })

    await sink.delete(location)
    await sink.delete(location)

    expect(await readdir(tempDir)).toEqual([])
  })

  it('reports a failed write as SinkDeliveryError', async () => {
    sink = new LocalDiskSink({
      folderPath: join(tempDir, 'never-opened'),
      filetype: 'json',
      logger: silentLogger,
    })

    await expect(
      sink.deliver({ pipelineName: 'b', artifactId: 'b_1', records })
    ).rejects.toBeInstanceOf(SinkDeliveryError)
  })

  it('serves artifacts over HTTP when a port is set', async () => {
    sink = new LocalDiskSink({
      folderPath: tempDir,
      filetype: 'csv',
      port: 0,
      host: '127.0.0.1',
      logger: silentLogger,
    })
    await sink.open()
    await sink.deliver({ pipelineName: 'b', artifactId: 'b_1', records })
    const baseUrl = `http://127.0.0.1:${sink.serverPort}`

    const listing = await fetch(`${baseUrl}/`)
    expect(listing.status).toBe(200)
    expect(await listing.json()).toEqual(['b_1.csv'])

    const file = await fetch(`${baseUrl}/b_1.csv`)
    expect(file.headers.get('content-type')).toBe('text/csv')
    expect(await file.text()).toBe(
      'timestamp,a\r\n2024-05-01T12:00:00.000+00:00,1\r\n2024-05-01T12:00:00.001+00:00,\r\n'
    )

    expect((await fetch(`${baseUrl}/missing.csv`)).status).toBe(404)
    expect((await fetch(`${baseUrl}/..%2Fsecret`)).status).toBe(404)
  })
})
