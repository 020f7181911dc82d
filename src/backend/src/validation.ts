/**
 * Save request validation.
 * Shape is checked with TypeBox; dataset invariants are checked against the
 * rows currently stored.
 */

import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import {
  CSV_HEADERS,
  isProjectPhase,
  isProjectStatus,
  type ProjectColumn,
  type ProjectRecord,
} from '../../shared/project'
import { parseDateKey, type StoredProject } from './csvCodec'
import { ValidationError } from './errors'

const MAX_REPORTED_ISSUES = 20

export const ProjectRecordSchema = Type.Object(
  {
    project_id: Type.String(),
    project_name: Type.String(),
    principal_investigator: Type.String(),
    department: Type.String(),
    start_date: Type.String(),
    end_date: Type.String(),
    budget: Type.Integer(),
    progress: Type.Integer(),
    research_area: Type.String(),
    status: Type.String(),
    current_phase: Type.String(),
    review_comments: Type.String(),
    action_items: Type.String(),
  },
  { additionalProperties: false }
)

export const SaveDatasetRequestSchema = Type.Object({
  base_version: Type.Integer({ minimum: 0 }),
  items: Type.Array(ProjectRecordSchema),
})

export type SaveDatasetBody = Static<typeof SaveDatasetRequestSchema>

export interface ValidationIssue {
  row: number
  field: string
  message: string
}

export function parseSaveRequest(body: unknown): SaveDatasetBody {
  if (Value.Check(SaveDatasetRequestSchema, body)) return body

  const issues = [...Value.Errors(SaveDatasetRequestSchema, body)]
    .slice(0, MAX_REPORTED_ISSUES)
    .map((e) => ({ path: e.path, message: e.message }))
  throw new ValidationError('Malformed save request', { issues })
}

/** Fields checked on new rows and whenever their value changes. */
function checkEditableFields(
  record: ProjectRecord,
  previous: StoredProject | undefined,
  report: (field: ProjectColumn, message: string) => void
): void {
  const changed = (field: 'budget' | 'progress' | 'status' | 'current_phase') =>
    previous === undefined || previous[field] !== record[field]

  if (changed('budget') && record.budget < 0) {
    report('budget', 'must not be negative')
  }
  if (changed('progress') && (record.progress < 0 || record.progress > 100)) {
    report('progress', 'must be between 0 and 100')
  }
  if (changed('status') && !isProjectStatus(record.status)) {
    report('status', `unknown status "${record.status}"`)
  }
  if (changed('current_phase') && !isProjectPhase(record.current_phase)) {
    report('current_phase', `unknown phase "${record.current_phase}"`)
  }
}

export function validateDataset(
  items: readonly ProjectRecord[],
  stored: readonly StoredProject[]
): void {
  const storedById = new Map(
    stored.map((p): [string, StoredProject] => [p.project_id, p])
  )
  const seen = new Set<string>()
  const issues: ValidationIssue[] = []

  items.forEach((record, row) => {
    const report = (field: ProjectColumn, message: string) => {
      issues.push({ row, field: CSV_HEADERS[field], message })
    }

    const id = record.project_id.trim()
    if (!id) report('project_id', 'is required')
    if (!record.project_name.trim()) report('project_name', 'is required')

    if (id && seen.has(id)) report('project_id', `duplicate identifier ${id}`)
    seen.add(id)

    if (!parseDateKey(record.start_date)) report('start_date', 'must be YYYY-MM-DD')
    if (!parseDateKey(record.end_date)) report('end_date', 'must be YYYY-MM-DD')

    const previous = storedById.get(id)
    if (previous && previous.project_name !== record.project_name) {
      report('project_name', 'cannot change on an existing project')
    }

    checkEditableFields(record, previous, report)
  })

  if (issues.length > 0) {
    throw new ValidationError(`Invalid dataset: ${issues.length} issue(s)`, {
      issues: issues.slice(0, MAX_REPORTED_ISSUES),
    })
  }
}
