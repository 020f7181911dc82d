import clsx from 'clsx'
import type { ProjectColumn, VisibleRow } from '../types/project'
import { COLUMN_CONFIG, formatBudget, widthStyles } from '../lib/columns'

interface ProjectTableProps {
  rows: VisibleRow[]
  columns: ProjectColumn[]
}

export function ProgressBar({ value }: { value: number }) {
  const clamped = Math.min(100, Math.max(0, value))
  return (
    <div className="flex items-center gap-2">
      <div
        role="progressbar"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={value}
        className="h-2 w-20 rounded-full bg-gray-200"
      >
        <div className="h-2 rounded-full bg-blue-600" style={{ width: `${clamped}%` }} />
      </div>
      <span className="text-xs text-gray-600">{value}%</span>
    </div>
  )
}

function renderCell(column: ProjectColumn, row: VisibleRow) {
  const value = row[column]
  if (value === undefined) return null
  if (typeof value === 'number') {
    return column === 'progress' ? <ProgressBar value={value} /> : formatBudget(value)
  }
  return value
}

export function ProjectTable({ rows, columns }: ProjectTableProps) {
  if (rows.length === 0) {
    return (
      <div className="text-center py-12 text-gray-500">표시할 프로젝트가 없습니다.</div>
    )
  }

  return (
    <div className="max-h-[500px] overflow-auto rounded-lg border border-gray-200 bg-white">
      <table className="min-w-full text-sm">
        <thead className="sticky top-0 bg-gray-50 text-gray-500">
          <tr>
            {columns.map((column) => (
              <th
                key={column}
                className={clsx('px-3 py-2 text-left font-medium', widthStyles[COLUMN_CONFIG[column].width])}
              >
                {COLUMN_CONFIG[column].label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, rowIndex) => (
            <tr key={rowIndex} className="border-t border-gray-100">
              {columns.map((column) => (
                <td key={column} className="px-3 py-2 text-gray-900">
                  {renderCell(column, row)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
