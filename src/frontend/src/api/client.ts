import type { ErrorCode } from '../types/project'

const API_BASE_URL = import.meta.env.VITE_API_URL || 'http://localhost:8000'

export class ApiError extends Error {
  constructor(
    public status: number,
    public statusText: string,
    message?: string,
    public code?: ErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message || `${status} ${statusText}`)
    this.name = 'ApiError'
  }
}

interface ErrorBody {
  error?: {
    code?: ErrorCode
    message?: string
    details?: Record<string, unknown>
  }
}

export async function apiRequest<T>(
  endpoint: string,
  options: RequestInit = {}
): Promise<T> {
  const url = `${API_BASE_URL}${endpoint}`

  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
  })

  if (!response.ok) {
    const errorData: ErrorBody = await response.json().catch(() => ({}))
    throw new ApiError(
      response.status,
      response.statusText,
      errorData.error?.message,
      errorData.error?.code,
      errorData.error?.details
    )
  }

  return response.json()
}
