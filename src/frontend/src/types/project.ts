export {
  CSV_HEADERS,
  PROJECT_COLUMNS,
  PROJECT_PHASES,
  PROJECT_STATUSES,
  isImmutableColumn,
  isProjectColumn,
  isProjectPhase,
  isProjectStatus,
} from '../../../shared/project'
export type {
  ApiErrorPayload,
  DatasetResponse,
  ErrorCode,
  ProjectColumn,
  ProjectPhase,
  ProjectRecord,
  ProjectStatus,
  SaveDatasetRequest,
} from '../../../shared/project'

import type { ProjectColumn, ProjectRecord } from '../../../shared/project'

/** Filter value meaning "no restriction". */
export const ALL = 'all'

export interface FilterSelection {
  department: string
  status: string
  hiddenColumns: ProjectColumn[]
}

export type ViewMode = 'readOnly' | 'editing'

/** A row restricted to the non-hidden columns. */
export type VisibleRow = Partial<ProjectRecord>

/** One cell change, typed per column. */
export type CellEdit = {
  [C in ProjectColumn]: { key: string; column: C; value: ProjectRecord[C] }
}[ProjectColumn]
