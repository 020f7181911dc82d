/**
 * Server entry point.
 */

import 'dotenv/config'
import { createApp } from './app'
import { loadConfig } from './config'
import { CsvDatasetStore } from './datasetStore'

const config = loadConfig()
const store = new CsvDatasetStore(config.dataPath)
const app = createApp({ store, corsOrigin: config.corsOrigin })

app.listen(config.port, () => {
  console.info(`Server listening on http://localhost:${config.port}`)
  console.info(`Data file: ${store.path}`)
})
