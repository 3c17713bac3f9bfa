import { describe, expect, it } from 'vitest'
import { SinkDeleteError, SinkDeliveryError, silentLogger } from '@datafaucet/common'
import { ObjectStoreSink, type ObjectStoreClient } from './object-store-sink'

class FakeObjectStore implements ObjectStoreClient {
  readonly bucketName = 'test-bucket'
  readonly objects = new Map<string, { body: string; contentType: string }>()
  failPuts = false
  failRemoves = false

  async put(key: string, body: string, contentType: string): Promise<void> {
    if (this.failPuts) {
      throw new Error('quota exceeded')
    }
    this.objects.set(key, { body, contentType })
  }

  async remove(key: string): Promise<void> {
    if (this.failRemoves) {
      throw new Error('permission denied')
    }
    this.objects.delete(key)
  }
}

const records = [{ timestamp: 't0', a: 1 }]

describe('ObjectStoreSink', () => {
  it('uploads one object under the folder prefix', async () => {
    const client = new FakeObjectStore()
    const sink = new ObjectStoreSink({
      client,
      folderPath: '/exports/',
      filetype: 'csv',
      logger: silentLogger,
    })

    const location = await sink.deliver({
      pipelineName: 'batch_1',
      artifactId: 'batch_1_20240501T120000000Z',
      records,
    })

    expect(location).toBe('gs://test-bucket/exports/batch_1_20240501T120000000Z.csv')
    expect(client.objects.get('exports/batch_1_20240501T120000000Z.csv')).toEqual({
      body: 'timestamp,a\r\nt0,1\r\n',
      contentType: 'text/csv',
    })
  })

  it('writes to the bucket root without a folder', async () => {
    const sink = new ObjectStoreSink({
      client: new FakeObjectStore(),
      folderPath: '',
      filetype: 'json',
      logger: silentLogger,
    })

    const location = await sink.deliver({ pipelineName: 'b', artifactId: 'b_1', records })

    expect(location).toBe('gs://test-bucket/b_1.json')
  })

  it('deletes idempotently and wraps failures', async () => {
    const client = new FakeObjectStore()
    const sink = new ObjectStoreSink({ client, folderPath: 'x', filetype: 'json', logger: silentLogger })
    const location = await sink.deliver({ pipelineName: 'b', artifactId: 'b_1', records })

    await sink.delete(location)
    await sink.delete(location)
    expect(client.objects.size).toBe(0)

    client.failRemoves = true
    await expect(sink.delete(location)).rejects.toBeInstanceOf(SinkDeleteError)
    await expect(sink.delete('gs://other-bucket/x/b_1.json')).rejects.toThrow(
      'Location is outside bucket test-bucket'
    )
  })

  it('wraps upload failures in SinkDeliveryError', async () => {
    const client = new FakeObjectStore()
    client.failPuts = true
    const sink = new ObjectStoreSink({ client, folderPath: '', filetype: 'json', logger: silentLogger })

    await expect(
      sink.deliver({ pipelineName: 'b', artifactId: 'b_1', records })
    ).rejects.toBeInstanceOf(SinkDeliveryError)
  })
})
