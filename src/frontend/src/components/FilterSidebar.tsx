import { ALL, PROJECT_COLUMNS, type FilterSelection, type ProjectColumn } from '../types/project'
import { columnLabel } from '../lib/columns'

interface FilterSidebarProps {
  departments: string[]
  statuses: string[]
  selection: FilterSelection
  totalCount: number
  visibleCount: number
  rowFiltersDisabled?: boolean
  onDepartmentChange: (department: string) => void
  onStatusChange: (status: string) => void
  onToggleColumn: (column: ProjectColumn) => void
}

const selectClass =
  'mt-1 block w-full rounded-md border border-gray-300 px-3 py-2 shadow-sm focus:border-blue-500 focus:outline-none focus:ring-1 focus:ring-blue-500 disabled:bg-gray-100 disabled:text-gray-500'

export function FilterSidebar({
  departments,
  statuses,
  selection,
  totalCount,
  visibleCount,
  rowFiltersDisabled,
  onDepartmentChange,
  onStatusChange,
  onToggleColumn,
}: FilterSidebarProps) {
  return (
    <aside className="w-64 shrink-0 space-y-6">
      <section>
        <h2 className="text-sm font-semibold text-gray-900 mb-3">필터</h2>
        <div className="space-y-3">
          <div>
            <label htmlFor="department-filter" className="block text-sm font-medium text-gray-700">
              부서
            </label>
            <select
              id="department-filter"
              value={selection.department}
              disabled={rowFiltersDisabled}
              onChange={(e) => onDepartmentChange(e.target.value)}
              className={selectClass}
            >
              <option value={ALL}>전체</option>
              {departments.map((department) => (
                <option key={department} value={department}>
                  {department}
                </option>
              ))}
            </select>
          </div>
          <div>
            <label htmlFor="status-filter" className="block text-sm font-medium text-gray-700">
              상태
            </label>
            <select
              id="status-filter"
              value={selection.status}
              disabled={rowFiltersDisabled}
              onChange={(e) => onStatusChange(e.target.value)}
              className={selectClass}
            >
              <option value={ALL}>전체</option>
              {statuses.map((status) => (
                <option key={status} value={status}>
                  {status}
                </option>
              ))}
            </select>
          </div>
        </div>
      </section>

      <section>
        <h2 className="text-sm font-semibold text-gray-900 mb-3">컬럼 설정</h2>
        <fieldset>
          <legend className="text-xs font-medium text-gray-600 mb-2">숨길 컬럼 선택</legend>
          <div className="space-y-1">
            {PROJECT_COLUMNS.map((column) => (
              <label key={column} className="flex items-center gap-2 text-sm text-gray-700">
                <input
                  type="checkbox"
                  checked={selection.hiddenColumns.includes(column)}
                  onChange={() => onToggleColumn(column)}
                  className="rounded border-gray-300"
                />
                {columnLabel(column)}
              </label>
            ))}
          </div>
        </fieldset>
      </section>

      <section className="border-t border-gray-200 pt-4">
        <p className="rounded-md bg-blue-50 px-3 py-2 text-sm text-blue-700">
          현재 표시된 프로젝트 통계
        </p>
        <ul className="mt-2 space-y-1 text-sm text-gray-700">
          <li>전체 프로젝트: {totalCount}개</li>
          <li>필터링된 프로젝트: {visibleCount}개</li>
        </ul>
      </section>
    </aside>
  )
}
