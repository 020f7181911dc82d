/**
 * Derives the visible view of the dataset: a linear scan over the rows,
 * then a projection onto the non-hidden columns. Row order is preserved.
 */

import {
  ALL,
  PROJECT_COLUMNS,
  type FilterSelection,
  type ProjectColumn,
  type ProjectRecord,
  type VisibleRow,
} from '../types/project'

export function matchesFilter(record: ProjectRecord, selection: FilterSelection): boolean {
  return (
    (selection.department === ALL || record.department === selection.department) &&
    (selection.status === ALL || record.status === selection.status)
  )
}

export function filterRows(
  dataset: readonly ProjectRecord[],
  selection: FilterSelection
): ProjectRecord[] {
  return dataset.filter((record) => matchesFilter(record, selection))
}

export function visibleColumns(hiddenColumns: readonly ProjectColumn[]): ProjectColumn[] {
  return PROJECT_COLUMNS.filter((column) => !hiddenColumns.includes(column))
}

function copyField<C extends ProjectColumn>(
  target: VisibleRow,
  source: ProjectRecord,
  column: C
): void {
  target[column] = source[column]
}

export function projectRow(
  record: ProjectRecord,
  hiddenColumns: readonly ProjectColumn[]
): VisibleRow {
  const row: VisibleRow = {}
  for (const column of visibleColumns(hiddenColumns)) {
    copyField(row, record, column)
  }
  return row
}

export function applyFilter(
  dataset: readonly ProjectRecord[],
  selection: FilterSelection
): VisibleRow[] {
  return filterRows(dataset, selection).map((record) =>
    projectRow(record, selection.hiddenColumns)
  )
}

/** Sorted unique values of a column, for the filter option lists. */
export function distinctValues(
  dataset: readonly ProjectRecord[],
  column: 'department' | 'status'
): string[] {
  return [...new Set(dataset.map((record) => record[column]))].sort((a, b) =>
    a < b ? -1 : a > b ? 1 : 0
  )
}
