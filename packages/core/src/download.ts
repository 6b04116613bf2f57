import { createWriteStream } from 'node:fs'
import { mkdtemp, rm } from 'node:fs/promises'
import { once } from 'node:events'
import { tmpdir } from 'node:os'
import { basename, join } from 'node:path'
import { createHash } from 'node:crypto'
import { NetworkError } from './errors.js'
import { createLogger } from './logger.js'
import { silentProgress, type ProgressReporter } from './progress.js'
import { withRetry, type RetryOptions } from './retry.js'
import { USER_AGENT } from './settings.js'

const log = createLogger('download')

/**
 * The subset of `fetch` the engine needs. Injected so tests can answer
 * requests in-process.
 */
export type HttpClient = (url: string, init?: RequestInit) => Promise<Response>

export type RequestOptions = {
  headers?: Record<string, string>
}

/**
 * A downloaded asset on disk. The temp directory belongs to the handle and
 * goes away on `dispose()`.
 */
export type DownloadHandle = {
  path: string
  name: string
  size: number
  checksum: string
  dispose: () => Promise<void>
}

export type DownloadOptions = {
  url: string
  assetName: string
  client: HttpClient
  progress?: ProgressReporter
  retry?: RetryOptions
}

export async function request(
  client: HttpClient,
  url: string,
  options: RequestOptions = {},
): Promise<Response> {
  let response: Response
  try {
    response = await client(url, {
      headers: {
        'User-Agent': USER_AGENT,
        ...options.headers,
      },
      redirect: 'follow',
    })
  } catch (error) {
    throw new NetworkError(
      `Failed to reach '${url}'. Please check your network connection.`,
      { url, transient: true, cause: error },
    )
  }

  if (!response.ok) {
    const { status } = response
    throw new NetworkError(
      `Request to '${url}' failed: ${status} ${response.statusText}`,
      { url, status, transient: status >= 500 || status === 429 },
    )
  }

  return response
}

async function streamToFile(
  response: Response,
  url: string,
  destination: string,
  progress: ProgressReporter,
): Promise<{ size: number; checksum: string }> {
  if (!response.body) {
    throw new NetworkError(`No response body received from ${url}`, {
      url,
      transient: true,
    })
  }

  const hash = createHash('sha256')
  const fileStream = createWriteStream(destination)
  const reader = response.body.getReader()
  let downloaded = 0

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        throw new NetworkError(`Failed to read download chunk from ${url}`, {
          url,
          transient: true,
          cause: error,
        })
      })
      if (chunk.done) break

      hash.update(chunk.value)
      if (!fileStream.write(chunk.value)) {
        await once(fileStream, 'drain')
      }
      downloaded += chunk.value.length
      progress.increment(chunk.value.length)
    }

    fileStream.end()
    await once(fileStream, 'finish')
  } catch (error) {
    fileStream.destroy()
    throw error
  }

  return { size: downloaded, checksum: `sha256:${hash.digest('hex')}` }
}

/**
 * Streams `url` into a fresh temp directory, retrying transient failures.
 * Each attempt starts from an empty file and resets the progress position.
 */
export async function downloadToTemp(
  options: DownloadOptions,
): Promise<DownloadHandle> {
  const { url, assetName, client, progress = silentProgress } = options
  const fileName = basename(assetName) || 'download'

  return withRetry(
    async (attempt) => {
      progress.setPosition(0)
      const dir = await mkdtemp(join(tmpdir(), 'shellnest-'))
      const dispose = () => rm(dir, { recursive: true, force: true })

      try {
        log.debug({ url, attempt }, 'Downloading asset')
        const response = await request(client, url)
        const total = Number(response.headers.get('content-length')) || 0
        progress.setLength(total)
        progress.setMessage(`Downloading ${assetName}`)

        const destination = join(dir, fileName)
        const { size, checksum } = await streamToFile(
          response,
          url,
          destination,
          progress,
        )
        log.debug({ url, size, checksum }, 'Download complete')

        return { path: destination, name: assetName, size, checksum, dispose }
      } catch (error) {
        await dispose()
        throw error
      }
    },
    { label: `download ${assetName}`, ...options.retry },
  )
}
