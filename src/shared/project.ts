export const PROJECT_STATUSES = ['진행중', '완료', '중단', '검토중', '준비중'] as const

export const PROJECT_PHASES = [
  '계획',
  '실험',
  '데이터수집',
  '분석',
  '검증',
  '논문작성',
  '특허출원',
] as const

export type ProjectStatus = (typeof PROJECT_STATUSES)[number]
export type ProjectPhase = (typeof PROJECT_PHASES)[number]

/** Field keys in file column order. */
export const PROJECT_COLUMNS = [
  'project_id',
  'project_name',
  'principal_investigator',
  'department',
  'start_date',
  'end_date',
  'budget',
  'progress',
  'research_area',
  'status',
  'current_phase',
  'review_comments',
  'action_items',
] as const

export type ProjectColumn = (typeof PROJECT_COLUMNS)[number]

export const CSV_HEADERS: Record<ProjectColumn, string> = {
  project_id: 'Project_ID',
  project_name: 'Project_Name',
  principal_investigator: 'Principal_Investigator',
  department: 'Department',
  start_date: 'Start_Date',
  end_date: 'End_Date',
  budget: 'Budget',
  progress: 'Progress',
  research_area: 'Research_Area',
  status: 'Status',
  current_phase: 'Current_Phase',
  review_comments: 'Review_Comments',
  action_items: 'Action_Items',
}

export const DATE_COLUMNS = ['start_date', 'end_date'] as const
export const INTEGER_COLUMNS = ['budget', 'progress'] as const

export type DateColumn = (typeof DATE_COLUMNS)[number]
export type IntegerColumn = (typeof INTEGER_COLUMNS)[number]

/** Columns that cannot change once a row exists. */
export const IMMUTABLE_COLUMNS = ['project_id', 'project_name'] as const

/**
 * Wire form of a project row. Dates are `YYYY-MM-DD`.
 * `status` and `current_phase` are plain strings because out-of-band file
 * edits may carry values outside the enumerated domains.
 */
export interface ProjectRecord {
  project_id: string
  project_name: string
  principal_investigator: string
  department: string
  start_date: string
  end_date: string
  budget: number
  progress: number
  research_area: string
  status: string
  current_phase: string
  review_comments: string
  action_items: string
}

export interface DatasetResponse {
  items: ProjectRecord[]
  total: number
  version: number
}

export interface SaveDatasetRequest {
  base_version: number
  items: ProjectRecord[]
}

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'FILE_NOT_FOUND'
  | 'PARSE_ERROR'
  | 'STALE_VERSION'
  | 'WRITE_ERROR'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR'

export interface ApiErrorPayload {
  readonly error: {
    readonly code: ErrorCode
    readonly message: string
    readonly details?: Record<string, unknown>
  }
}

function includes(values: readonly string[], value: string): boolean {
  return values.includes(value)
}

export function isProjectStatus(value: string): value is ProjectStatus {
  return includes(PROJECT_STATUSES, value)
}

export function isProjectPhase(value: string): value is ProjectPhase {
  return includes(PROJECT_PHASES, value)
}

export function isProjectColumn(value: string): value is ProjectColumn {
  return includes(PROJECT_COLUMNS, value)
}

export function isImmutableColumn(column: ProjectColumn): boolean {
  return includes(IMMUTABLE_COLUMNS, column)
}
