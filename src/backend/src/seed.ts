/**
 * Writes a synthetic dataset to the configured data file.
 *
 *   npm run seed -- --count 50 [--out ./data/research_projects.csv]
 */

import 'dotenv/config'
import { promises as fs } from 'node:fs'
import path from 'node:path'
import { parseArgs } from 'node:util'
import { loadConfig } from './config'
import { serializeDataset } from './csvCodec'
import { generateProjects } from './generator'

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      count: { type: 'string', short: 'n', default: '50' },
      out: { type: 'string', short: 'o' },
    },
  })

  const count = Number(values.count)
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Invalid --count: ${values.count}`)
  }

  const file = path.resolve(values.out ?? loadConfig().dataPath)
  await fs.mkdir(path.dirname(file), { recursive: true })
  await fs.writeFile(file, serializeDataset(generateProjects(count)), 'utf8')
  console.info(`Generated ${count} projects: ${file}`)
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err)
  process.exitCode = 1
})
