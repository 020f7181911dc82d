/**
 * Server configuration from environment variables (.env is loaded by the
 * entry points through dotenv).
 */

export interface ServerConfig {
  dataPath: string
  port: number
  corsOrigin: string
}

export const DEFAULT_DATA_PATH = './data/research_projects.csv'
const DEFAULT_PORT = 8000
const DEFAULT_CORS_ORIGIN = 'http://localhost:5173'

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT || DEFAULT_PORT)
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new Error(`Invalid PORT: ${env.PORT}`)
  }

  return {
    dataPath: env.DATA_PATH || DEFAULT_DATA_PATH,
    port,
    corsOrigin: env.CORS_ORIGIN || DEFAULT_CORS_ORIGIN,
  }
}
