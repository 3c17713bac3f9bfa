import { createReadStream } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http'
import { extname, join } from 'node:path'
import { once } from 'node:events'
import { describeError, type Logger } from '@datafaucet/common'

export interface ArtifactServerOptions {
  folderPath: string
  port: number
  host?: string
  logger: Logger
}

export interface ArtifactServerHandle {
  readonly port: number
  stop(): Promise<void>
}

const contentTypes: Record<string, string> = {
  '.json': 'application/json',
  '.csv': 'text/csv',
}

const isServableName = (name: string): boolean =>
  name.length > 0 && !name.startsWith('.') && !name.includes('/') && !name.includes('\\')

const notFound = (res: ServerResponse): void => {
  res.writeHead(404, { 'Content-Type': 'text/plain' })
  res.end('Not found')
}

const listArtifacts = async (folderPath: string): Promise<string[]> => {
  const entries = await readdir(folderPath, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && isServableName(entry.name))
    .map((entry) => entry.name)
    .sort()
}

const decodeName = (url: string): string | null => {
  try {
    return decodeURIComponent(url.split('?')[0].slice(1))
  } catch {
    return null
  }
}

const handleRequest = async (
  folderPath: string,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> => {
  const url = req.url ?? '/'
  if (req.method !== 'GET') {
    notFound(res)
    return
  }

  if (url === '/' || url.startsWith('/?')) {
    const names = await listArtifacts(folderPath)
    res.writeHead(200, { 'Content-Type': 'application/json' })
    res.end(JSON.stringify(names))
    return
  }

  const name = decodeName(url)
  if (name == null || !isServableName(name)) {
    notFound(res)
    return
  }

  const filePath = join(folderPath, name)
  const info = await stat(filePath).catch(() => null)
  if (info == null || !info.isFile()) {
    notFound(res)
    return
  }

  res.writeHead(200, {
    'Content-Type': contentTypes[extname(name)] ?? 'application/octet-stream',
    'Content-Length': info.size,
  })
  const stream = createReadStream(filePath)
  stream.on('error', () => res.destroy())
  stream.pipe(res)
}

/**
 * Serves the files of one folder read-only over HTTP.
 *
 * `GET /` lists artifact names as JSON, `GET /<name>` streams one artifact and
 * everything else is 404.
 * @param options Folder, port (0 picks a free one) and logger.
 * @returns Handle with the bound port and `stop()`.
 */
export const startArtifactServer = async (
  options: ArtifactServerOptions
): Promise<ArtifactServerHandle> => {
  const { folderPath, logger } = options
  const host = options.host ?? '0.0.0.0'

  const server = createServer((req, res) => {
    handleRequest(folderPath, req, res).catch((error: unknown) => {
      logger.warn('Artifact request failed', { url: req.url, error: describeError(error) })
      if (!res.headersSent) {
        res.writeHead(500)
      }
      res.end()
    })
  })

  server.listen(options.port, host)
  // Rejects when 'error' fires first, e.g. the port is taken.
  await once(server, 'listening')

  const address = server.address()
  const port = address != null && typeof address === 'object' ? address.port : options.port
  logger.info(`Serving artifacts on http://${host}:${port}/`, { folder: folderPath })

  return {
    port,
    stop: async () => {
      server.closeAllConnections()
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
      })
    },
  }
}
