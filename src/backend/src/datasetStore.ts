/**
 * File-backed dataset store. Owns the single in-memory copy of the CSV
 * contents and the version counter that save requests are checked against.
 */

import { promises as fs } from 'node:fs'
import path from 'node:path'
import { parseDataset, serializeDataset, type StoredProject } from './csvCodec'
import {
  FileNotFoundError,
  ParseError,
  StaleVersionError,
  WriteError,
  isErrnoException,
} from './errors'

export interface DatasetSnapshot {
  readonly items: readonly StoredProject[]
  readonly version: number
}

export interface DatasetStore {
  load(): Promise<DatasetSnapshot>
  save(items: readonly StoredProject[], baseVersion: number): Promise<DatasetSnapshot>
  invalidate(): void
}

export class CsvDatasetStore implements DatasetStore {
  private readonly filePath: string
  private cached: readonly StoredProject[] | null = null
  private version = 0
  private writes = 0
  /** Tail of the save queue; saves run one at a time. */
  private pending: Promise<unknown> = Promise.resolve()

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath)
  }

  get path(): string {
    return this.filePath
  }

  async load(): Promise<DatasetSnapshot> {
    if (this.cached === null) {
      this.cached = await this.readFile()
      if (this.version === 0) this.version = 1
    }
    return { items: this.cached, version: this.version }
  }

  save(items: readonly StoredProject[], baseVersion: number): Promise<DatasetSnapshot> {
    const run = this.pending.then(() => this.saveNow(items, baseVersion))
    // Failures reach the caller through `run`; the queue only orders saves.
    this.pending = run.catch(() => undefined)
    return run
  }

  invalidate(): void {
    this.cached = null
  }

  private async saveNow(
    items: readonly StoredProject[],
    baseVersion: number
  ): Promise<DatasetSnapshot> {
    // The version is only known once the file has been read.
    if (this.version === 0) await this.load()

    if (baseVersion !== this.version) {
      throw new StaleVersionError('Dataset changed since it was loaded', {
        baseVersion,
        currentVersion: this.version,
      })
    }

    await this.writeFile(serializeDataset(items))

    this.version += 1
    // The next load re-reads the file.
    this.invalidate()
    return { items: [...items], version: this.version }
  }

  private async readFile(): Promise<StoredProject[]> {
    let text: string
    try {
      text = await fs.readFile(this.filePath, 'utf8')
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new FileNotFoundError(`Data file not found: ${this.filePath}`, {
          path: this.filePath,
        })
      }
      throw new ParseError(
        `Cannot read data file: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.filePath }
      )
    }
    return parseDataset(text)
  }

  private async writeFile(text: string): Promise<void> {
    this.writes += 1
    const tmp = `${this.filePath}.${process.pid}-${this.writes}.tmp`
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(tmp, text, 'utf8')
      await fs.rename(tmp, this.filePath)
    } catch (err: unknown) {
      await fs.rm(tmp, { force: true })
      throw new WriteError(
        `Cannot write data file: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.filePath }
      )
    }
  }
}
