/**
 * CSV codec for the project dataset.
 * Text in, typed rows out, and back. No file access here.
 */

import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { format, isValid, parse as parseDate } from 'date-fns'
import {
  CSV_HEADERS,
  PROJECT_COLUMNS,
  type DateColumn,
  type IntegerColumn,
  type ProjectColumn,
  type ProjectRecord,
} from '../../shared/project'
import { ParseError } from './errors'

/** Server-side row: the two date fields are real dates. */
export type StoredProject = Omit<ProjectRecord, DateColumn> & {
  start_date: Date
  end_date: Date
}

const DATE_KEY_FORMAT = 'yyyy-MM-dd'
const DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/
const INTEGER = /^-?\d+(?:\.0+)?$/
const BOM = '\uFEFF'

/**
 * Parses `YYYY-MM-DD` (or an ISO date-time, using its date part) into a
 * local-midnight Date. Returns null for anything else.
 */
export function parseDateKey(value: string): Date | null {
  const match = DATE_PREFIX.exec(value.trim())
  if (!match) return null
  const date = parseDate(match[1], DATE_KEY_FORMAT, new Date(2000, 0, 1))
  return isValid(date) ? date : null
}

export function formatDateKey(date: Date): string {
  return format(date, DATE_KEY_FORMAT)
}

export function parseInteger(value: string): number | null {
  const trimmed = value.trim()
  if (!INTEGER.test(trimmed)) return null
  return Number.parseInt(trimmed, 10)
}

export function toRecord(project: StoredProject): ProjectRecord {
  return {
    ...project,
    start_date: formatDateKey(project.start_date),
    end_date: formatDateKey(project.end_date),
  }
}

/** Record dates are assumed already validated as date keys. */
export function fromRecord(record: ProjectRecord): StoredProject {
  const start = parseDateKey(record.start_date)
  const end = parseDateKey(record.end_date)
  if (!start || !end) {
    throw new ParseError('Invalid date in project record', {
      projectId: record.project_id,
    })
  }
  return { ...record, start_date: start, end_date: end }
}

function toCells(value: unknown): string[][] {
  if (!Array.isArray(value)) throw new ParseError('CSV parser returned no rows')
  return value.map((row: unknown) => {
    if (!Array.isArray(row)) throw new ParseError('CSV parser returned a malformed row')
    return row.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell)))
  })
}

type ColumnIndex = (column: ProjectColumn) => number

function columnIndex(header: string[]): ColumnIndex {
  const trimmed = header.map((name) => name.trim())
  const missing = PROJECT_COLUMNS.map((column) => CSV_HEADERS[column]).filter(
    (name) => !trimmed.includes(name)
  )

  if (missing.length > 0) {
    throw new ParseError(`Missing columns: ${missing.join(', ')}`, { missing })
  }
  return (column) => trimmed.indexOf(CSV_HEADERS[column])
}

function readRow(
  cells: string[],
  indexOf: ColumnIndex,
  line: number
): StoredProject {
  const cell = (column: ProjectColumn): string => cells[indexOf(column)] ?? ''

  const requireDate = (column: DateColumn): Date => {
    const date = parseDateKey(cell(column))
    if (!date) {
      throw new ParseError(`Invalid ${CSV_HEADERS[column]} on row ${line}`, {
        line,
        column: CSV_HEADERS[column],
        value: cell(column),
      })
    }
    return date
  }

  const requireInteger = (column: IntegerColumn): number => {
    const value = parseInteger(cell(column))
    if (value === null) {
      throw new ParseError(`Invalid ${CSV_HEADERS[column]} on row ${line}`, {
        line,
        column: CSV_HEADERS[column],
        value: cell(column),
      })
    }
    return value
  }

  const progress = requireInteger('progress')
  if (progress < 0 || progress > 100) {
    throw new ParseError(`Progress out of range on row ${line}`, {
      line,
      column: CSV_HEADERS.progress,
      value: cell('progress'),
    })
  }

  const projectId = cell('project_id').trim()
  if (!projectId) {
    throw new ParseError(`Missing Project_ID on row ${line}`, { line })
  }

  return {
    project_id: projectId,
    project_name: cell('project_name'),
    principal_investigator: cell('principal_investigator'),
    department: cell('department'),
    start_date: requireDate('start_date'),
    end_date: requireDate('end_date'),
    budget: requireInteger('budget'),
    progress,
    research_area: cell('research_area'),
    status: cell('status'),
    current_phase: cell('current_phase'),
    // Missing free text reads as ''.
    review_comments: cell('review_comments'),
    action_items: cell('action_items'),
  }
}

export function parseDataset(text: string): StoredProject[] {
  let raw: unknown
  try {
    raw = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true })
  } catch (err) {
    throw new ParseError(err instanceof Error ? err.message : 'Malformed CSV')
  }

  const [header, ...body] = toCells(raw)
  if (!header) throw new ParseError('Missing header row')

  const indexOf = columnIndex(header)
  const seen = new Set<string>()

  return body.map((cells, idx) => {
    const line = idx + 2
    const row = readRow(cells, indexOf, line)
    if (seen.has(row.project_id)) {
      throw new ParseError(`Duplicate Project_ID ${row.project_id} on row ${line}`, {
        line,
        projectId: row.project_id,
      })
    }
    seen.add(row.project_id)
    return row
  })
}

export function serializeDataset(items: readonly StoredProject[]): string {
  const header = PROJECT_COLUMNS.map((column) => CSV_HEADERS[column])
  const rows = items.map((item) => {
    const record = toRecord(item)
    return PROJECT_COLUMNS.map((column) => String(record[column]))
  })
  return BOM + stringify([header, ...rows], { record_delimiter: 'unix' })
}
