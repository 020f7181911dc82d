/**
 * Edit buffer for one edit-mode activation.
 *
 * The buffer holds full copies of the rows that were visible when editing
 * started. Nothing touches the dataset until `commitEdits`, which merges the
 * buffer back: seeded rows are overwritten or removed, rows that were
 * filtered out stay exactly as they were, and new rows are appended.
 */

import { format } from 'date-fns'
import {
  isImmutableColumn,
  isProjectPhase,
  isProjectStatus,
  type CellEdit,
  type ProjectRecord,
} from '../types/project'

export interface BufferedRow {
  /** Project_ID for seeded rows, `new-<n>` for rows added in this session. */
  key: string
  isNew: boolean
  values: ProjectRecord
}

export interface EditBuffer {
  rows: BufferedRow[]
  seededIds: string[]
  nextLocalId: number
}

export class EditCommitError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EditCommitError'
  }
}

const PROJECT_ID_PATTERN = /^PRJ-(\d+)$/

export function beginEdit(visibleRows: readonly ProjectRecord[]): EditBuffer {
  return {
    rows: visibleRows.map((record) => ({
      key: record.project_id,
      isNew: false,
      values: { ...record },
    })),
    seededIds: visibleRows.map((record) => record.project_id),
    nextLocalId: 1,
  }
}

function toCount(value: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isFinite(value)) return 0
  return Math.min(max, Math.max(0, Math.round(value)))
}

function isAcceptedEdit(row: BufferedRow, edit: CellEdit): boolean {
  if (isImmutableColumn(edit.column)) return row.isNew
  switch (edit.column) {
    case 'status':
      return isProjectStatus(edit.value)
    case 'current_phase':
      return isProjectPhase(edit.value)
    default:
      return true
  }
}

function applyEdit(values: ProjectRecord, edit: CellEdit): ProjectRecord {
  switch (edit.column) {
    case 'budget':
      return { ...values, budget: toCount(edit.value) }
    case 'progress':
      return { ...values, progress: toCount(edit.value, 100) }
    default:
      return { ...values, [edit.column]: edit.value }
  }
}

/**
 * Applies one cell change. Changes to the identifier columns of existing
 * rows and enum values outside their domain are ignored.
 */
export function updateCell(buffer: EditBuffer, edit: CellEdit): EditBuffer {
  const row = buffer.rows.find((r) => r.key === edit.key)
  if (!row || !isAcceptedEdit(row, edit)) return buffer

  return {
    ...buffer,
    rows: buffer.rows.map((r) =>
      r === row ? { ...r, values: applyEdit(r.values, edit) } : r
    ),
  }
}

export function emptyProject(today: Date = new Date()): ProjectRecord {
  const date = format(today, 'yyyy-MM-dd')
  return {
    project_id: '',
    project_name: '',
    principal_investigator: '',
    department: '',
    start_date: date,
    end_date: date,
    budget: 0,
    progress: 0,
    research_area: '',
    status: '준비중',
    current_phase: '계획',
    review_comments: '',
    action_items: '',
  }
}

export function addRow(buffer: EditBuffer, today?: Date): EditBuffer {
  return {
    ...buffer,
    rows: [
      ...buffer.rows,
      { key: `new-${buffer.nextLocalId}`, isNew: true, values: emptyProject(today) },
    ],
    nextLocalId: buffer.nextLocalId + 1,
  }
}

export function removeRow(buffer: EditBuffer, key: string): EditBuffer {
  return { ...buffer, rows: buffer.rows.filter((r) => r.key !== key) }
}

/** Next `PRJ-NNN` identifier after the highest one in use. */
export function nextProjectId(ids: Iterable<string>): string {
  let max = 0
  for (const id of ids) {
    const match = PROJECT_ID_PATTERN.exec(id)
    if (match) max = Math.max(max, Number(match[1]))
  }
  return `PRJ-${String(max + 1).padStart(3, '0')}`
}

export function commitEdits(
  dataset: readonly ProjectRecord[],
  buffer: EditBuffer
): ProjectRecord[] {
  const seeded = new Set(buffer.seededIds)
  const edited = new Map(
    buffer.rows.filter((r) => !r.isNew).map((r): [string, ProjectRecord] => [r.key, r.values])
  )

  const result: ProjectRecord[] = []
  for (const record of dataset) {
    if (!seeded.has(record.project_id)) {
      result.push(record)
      continue
    }
    const values = edited.get(record.project_id)
    // Seeded but gone from the buffer: deleted.
    if (!values) continue
    result.push({
      ...values,
      project_id: record.project_id,
      project_name: record.project_name,
    })
  }

  const taken = new Set(result.map((r) => r.project_id))
  for (const row of buffer.rows.filter((r) => r.isNew)) {
    if (!row.values.project_name.trim()) {
      throw new EditCommitError('새 프로젝트의 프로젝트명을 입력하세요.')
    }
    const requested = row.values.project_id.trim()
    if (requested && taken.has(requested)) {
      throw new EditCommitError(`이미 존재하는 프로젝트 ID입니다: ${requested}`)
    }
    const id = requested || nextProjectId(taken)
    taken.add(id)
    result.push({ ...row.values, project_id: id })
  }

  return result
}
