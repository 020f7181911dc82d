/**
 * HTTP API over the dataset store. Routing and error mapping only; the
 * store and validation modules hold the rules.
 */

import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express'
import cors from 'cors'
import type { DatasetResponse } from '../../shared/project'
import { apiError, mapError } from './apiErrors'
import { fromRecord, toRecord } from './csvCodec'
import type { DatasetSnapshot, DatasetStore } from './datasetStore'
import { StaleVersionError } from './errors'
import { parseSaveRequest, validateDataset } from './validation'

const BASE_PATH = '/api/v1/projects'

export interface Logger {
  info: (message: string) => void
  error: (err: unknown) => void
}

export interface AppDeps {
  store: DatasetStore
  corsOrigin?: string
  logger?: Logger
}

function toResponse(snapshot: DatasetSnapshot): DatasetResponse {
  return {
    items: snapshot.items.map(toRecord),
    total: snapshot.items.length,
    version: snapshot.version,
  }
}

/** Forwards rejected promises to the error middleware. */
function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next)
  }
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err
}

export function createApp({ store, corsOrigin, logger = console }: AppDeps) {
  const app = express()

  if (corsOrigin) {
    app.use(cors({ origin: corsOrigin, methods: ['GET', 'PUT'] }))
  }
  app.use(express.json({ limit: '10mb' }))

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  app.get(
    BASE_PATH,
    asyncRoute(async (_req, res) => {
      res.json(toResponse(await store.load()))
    })
  )

  app.put(
    BASE_PATH,
    asyncRoute(async (req, res) => {
      const request = parseSaveRequest(req.body)
      const current = await store.load()

      if (request.base_version !== current.version) {
        throw new StaleVersionError('Dataset changed since it was loaded', {
          baseVersion: request.base_version,
          currentVersion: current.version,
        })
      }

      validateDataset(request.items, current.items)
      const saved = await store.save(request.items.map(fromRecord), request.base_version)
      logger.info(`saved ${saved.items.length} projects (version ${saved.version})`)
      res.json(toResponse(saved))
    })
  )

  app.use((_req, res) => {
    res.status(404).json(apiError('NOT_FOUND', 'Not Found'))
  })

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json(apiError('INVALID_INPUT', 'Invalid JSON'))
      return
    }

    const mapped = mapError(err)
    if (mapped) {
      res.status(mapped.status).json(mapped.payload)
      return
    }

    logger.error(err)
    res.status(500).json(apiError('INTERNAL_ERROR', 'Internal Server Error'))
  })

  return app
}
