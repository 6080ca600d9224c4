import http, { type RequestListener, type Server } from 'node:http'
import logger from '../../shared/logger'

export type HttpServer = {
  readonly server: Server
  /** Resolves with the bound port once the server accepts connections. */
  listen(port: number): Promise<number>
  /** Stops accepting connections and waits for in-flight requests. No-op when not listening. */
  close(): Promise<void>
}

type LogLevel = 'info' | 'warn' | 'error'

export function requestLogLevel(statusCode: number): LogLevel {
  if (statusCode >= 500) return 'error'
  if (statusCode >= 400) return 'warn'
  return 'info'
}

// Query strings can carry document text; only the path is logged.
export function pathOf(url: string | undefined): string {
  if (!url) return '/'
  const q = url.indexOf('?')
  return q === -1 ? url : url.slice(0, q)
}

export function createHttpServer(handler: RequestListener): HttpServer {
  const server = http.createServer((req, res) => {
    const startedAt = Date.now()

    res.on('finish', () => {
      logger.log(requestLogLevel(res.statusCode), '[HTTP] request', {
        method: req.method ?? 'GET',
        path: pathOf(req.url),
        statusCode: res.statusCode,
        ms: Date.now() - startedAt,
        bytesIn: Number(req.headers['content-length'] ?? 0),
      })
    })

    handler(req, res)
  })

  server.on('error', (err) => {
    logger.error('[HTTP] server_error', { errorMessage: err.message })
  })

  return {
    server,

    listen(port: number) {
      return new Promise<number>((resolve, reject) => {
        const onError = (err: Error) => reject(err)
        server.once('error', onError)

        server.listen(port, () => {
          server.off('error', onError)
          const addr = server.address()
          const bound = addr && typeof addr === 'object' ? addr.port : port
          logger.info('[HTTP] listening', { port: bound })
          resolve(bound)
        })
      })
    },

    close() {
      if (!server.listening) return Promise.resolve()

      return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
        server.closeIdleConnections()
      }).then(() => {
        logger.info('[HTTP] closed')
      })
    },
  }
}
