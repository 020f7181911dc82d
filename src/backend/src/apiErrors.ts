/**
 * API error payload and the mapping from domain errors to HTTP codes.
 */

import type { ApiErrorPayload, ErrorCode } from '../../shared/project'
import {
  DomainError,
  FileNotFoundError,
  ParseError,
  StaleVersionError,
  ValidationError,
  WriteError,
} from './errors'

export function apiError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } }
}

export interface MappedError {
  status: number
  payload: ApiErrorPayload
}

export function mapError(err: unknown): MappedError | null {
  if (!(err instanceof DomainError)) return null

  if (err instanceof FileNotFoundError) {
    return { status: 404, payload: apiError('FILE_NOT_FOUND', err.message, err.metadata) }
  }
  if (err instanceof ParseError) {
    return { status: 422, payload: apiError('PARSE_ERROR', err.message, err.metadata) }
  }
  if (err instanceof ValidationError) {
    return { status: 400, payload: apiError('INVALID_INPUT', err.message, err.metadata) }
  }
  if (err instanceof StaleVersionError) {
    return { status: 409, payload: apiError('STALE_VERSION', err.message, err.metadata) }
  }
  if (err instanceof WriteError) {
    return { status: 500, payload: apiError('WRITE_ERROR', err.message, err.metadata) }
  }
  return null
}
