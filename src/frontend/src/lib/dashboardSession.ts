/**
 * Per-session dashboard state: the filter selection, the view mode and the
 * edit buffer. Every UI handler goes through `sessionReducer`.
 *
 * readOnly --enterEdit--> editing --exitEdit (discard) | saved--> readOnly
 */

import {
  ALL,
  type CellEdit,
  type FilterSelection,
  type ProjectColumn,
  type ProjectRecord,
  type ViewMode,
} from '../types/project'
import { addRow, beginEdit, removeRow, updateCell, type EditBuffer } from './editSession'

export interface DashboardSession {
  filter: FilterSelection
  mode: ViewMode
  buffer: EditBuffer | null
}

export type SessionAction =
  | { type: 'setDepartment'; department: string }
  | { type: 'setStatus'; status: string }
  | { type: 'toggleColumn'; column: ProjectColumn }
  | { type: 'enterEdit'; visibleRows: readonly ProjectRecord[] }
  | { type: 'exitEdit' }
  | { type: 'editCell'; edit: CellEdit }
  | { type: 'addRow'; today?: Date }
  | { type: 'removeRow'; key: string }
  | { type: 'saved' }

export const initialSession: DashboardSession = {
  filter: { department: ALL, status: ALL, hiddenColumns: [] },
  mode: 'readOnly',
  buffer: null,
}

function withBuffer(
  state: DashboardSession,
  update: (buffer: EditBuffer) => EditBuffer
): DashboardSession {
  if (state.mode !== 'editing' || !state.buffer) return state
  return { ...state, buffer: update(state.buffer) }
}

export function sessionReducer(
  state: DashboardSession,
  action: SessionAction
): DashboardSession {
  switch (action.type) {
    // Row filters are locked while editing: the buffer was seeded from the
    // rows visible at that moment.
    case 'setDepartment':
      if (state.mode === 'editing') return state
      return { ...state, filter: { ...state.filter, department: action.department } }

    case 'setStatus':
      if (state.mode === 'editing') return state
      return { ...state, filter: { ...state.filter, status: action.status } }

    case 'toggleColumn': {
      const hidden = state.filter.hiddenColumns
      const hiddenColumns = hidden.includes(action.column)
        ? hidden.filter((c) => c !== action.column)
        : [...hidden, action.column]
      return { ...state, filter: { ...state.filter, hiddenColumns } }
    }

    case 'enterEdit':
      if (state.mode === 'editing') return state
      return { ...state, mode: 'editing', buffer: beginEdit(action.visibleRows) }

    case 'exitEdit':
    case 'saved':
      return { ...state, mode: 'readOnly', buffer: null }

    case 'editCell':
      return withBuffer(state, (buffer) => updateCell(buffer, action.edit))

    case 'addRow':
      return withBuffer(state, (buffer) => addRow(buffer, action.today))

    case 'removeRow':
      return withBuffer(state, (buffer) => removeRow(buffer, action.key))
  }
}
