/**
 * Editable grid over the edit buffer. Each column gets the widget named in
 * COLUMN_CONFIG; identifier columns are read-only on existing rows.
 */

import clsx from 'clsx'
import { isImmutableColumn, type CellEdit, type ProjectColumn } from '../types/project'
import type { BufferedRow } from '../lib/editSession'
import { COLUMN_CONFIG, widthStyles } from '../lib/columns'

interface EditableProjectTableProps {
  rows: BufferedRow[]
  columns: ProjectColumn[]
  onCellChange: (edit: CellEdit) => void
  onAddRow: () => void
  onRemoveRow: (key: string) => void
  /** Locks every control, e.g. while a save is in flight. */
  disabled?: boolean
}

const inputClass =
  'w-full rounded-md border border-gray-200 p-1 text-xs focus:border-blue-300 focus:outline-none read-only:bg-gray-50 read-only:text-gray-500'

function toEdit(key: string, column: ProjectColumn, raw: string): CellEdit {
  if (column === 'budget' || column === 'progress') {
    return { key, column, value: raw === '' ? 0 : Number(raw) }
  }
  return { key, column, value: raw }
}

interface CellEditorProps {
  row: BufferedRow
  column: ProjectColumn
  disabled?: boolean
  onCellChange: (edit: CellEdit) => void
}

function CellEditor({ row, column, disabled, onCellChange }: CellEditorProps) {
  const config = COLUMN_CONFIG[column]
  const value = row.values[column]
  const label = `${config.label} ${row.key}`
  const handleChange = (raw: string) => onCellChange(toEdit(row.key, column, raw))

  switch (config.widget.kind) {
    case 'select':
      return (
        <select
          aria-label={label}
          disabled={disabled}
          value={value}
          onChange={(event) => handleChange(event.target.value)}
          className={inputClass}
        >
          {/* Keeps an out-of-domain value from the file visible until it is changed. */}
          {!config.widget.options.includes(String(value)) && (
            <option value={value} disabled>
              {value}
            </option>
          )}
          {config.widget.options.map((option) => (
            <option key={option} value={option}>
              {option}
            </option>
          ))}
        </select>
      )

    case 'progress':
      return (
        <input
          type="number"
          aria-label={label}
          disabled={disabled}
          min={config.widget.min}
          max={config.widget.max}
          value={value}
          onChange={(event) => handleChange(event.target.value)}
          className={inputClass}
        />
      )

    case 'number':
      return (
        <input
          type="number"
          aria-label={label}
          disabled={disabled}
          min={0}
          step={10_000}
          value={value}
          onChange={(event) => handleChange(event.target.value)}
          className={inputClass}
        />
      )

    case 'date':
      return (
        <input
          type="date"
          aria-label={label}
          disabled={disabled}
          value={value}
          onChange={(event) => handleChange(event.target.value)}
          className={inputClass}
        />
      )

    case 'text':
      return (
        <input
          type="text"
          aria-label={label}
          disabled={disabled}
          value={value}
          title={config.help}
          readOnly={isImmutableColumn(column) && !row.isNew}
          onChange={(event) => handleChange(event.target.value)}
          className={inputClass}
        />
      )
  }
}

export function EditableProjectTable({
  rows,
  columns,
  onCellChange,
  onAddRow,
  onRemoveRow,
  disabled,
}: EditableProjectTableProps) {
  return (
    <div className="space-y-3">
      <div className="max-h-[500px] overflow-auto rounded-lg border border-gray-200 bg-white">
        <table className="min-w-full text-xs">
          <thead className="sticky top-0 bg-gray-50 text-gray-500">
            <tr>
              {columns.map((column) => (
                <th
                  key={column}
                  title={COLUMN_CONFIG[column].help}
                  className={clsx('px-3 py-2 text-left font-medium', widthStyles[COLUMN_CONFIG[column].width])}
                >
                  {COLUMN_CONFIG[column].label}
                </th>
              ))}
              <th className="px-3 py-2 text-right font-medium text-gray-400">삭제</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr key={row.key} className={clsx('border-t border-gray-100', row.isNew && 'bg-green-50')}>
                {columns.map((column) => (
                  <td key={column} className="px-3 py-2">
                    <CellEditor
                      row={row}
                      column={column}
                      disabled={disabled}
                      onCellChange={onCellChange}
                    />
                  </td>
                ))}
                <td className="px-3 py-2 text-right">
                  <button
                    type="button"
                    aria-label={`${row.key} 삭제`}
                    disabled={disabled}
                    onClick={() => onRemoveRow(row.key)}
                    className="text-xs text-gray-400 hover:text-red-500 disabled:opacity-50"
                  >
                    삭제
                  </button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      <button
        type="button"
        onClick={onAddRow}
        disabled={disabled}
        className="rounded-md border border-gray-200 px-3 py-1 text-xs text-gray-600 hover:bg-gray-50 disabled:opacity-50"
      >
        행 추가
      </button>
    </div>
  )
}
