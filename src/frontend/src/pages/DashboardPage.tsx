import { useMemo, useReducer, useState } from 'react'
import clsx from 'clsx'
import { useProjects, useSaveProjects } from '../hooks/useProjects'
import { ApiError } from '../api/client'
import { FilterSidebar } from '../components/FilterSidebar'
import { ProjectTable } from '../components/ProjectTable'
import { EditableProjectTable } from '../components/EditableProjectTable'
import { distinctValues, filterRows, projectRow, visibleColumns } from '../lib/filter'
import { commitEdits, EditCommitError } from '../lib/editSession'
import { initialSession, sessionReducer } from '../lib/dashboardSession'
import type { ProjectRecord } from '../types/project'

interface Notice {
  kind: 'success' | 'error'
  message: string
}

const EMPTY: ProjectRecord[] = []

function loadErrorMessage(error: Error): string {
  if (error instanceof ApiError && error.code === 'FILE_NOT_FOUND') {
    const path = error.details?.path
    return `데이터 파일을 찾을 수 없습니다: ${typeof path === 'string' ? path : error.message}`
  }
  return `데이터를 불러오는 중 오류가 발생했습니다: ${error.message}`
}

function saveErrorMessage(error: Error): string {
  const message = `저장 중 오류가 발생했습니다: ${error.message}`
  if (error instanceof ApiError && error.code === 'STALE_VERSION') {
    return `${message} 다른 곳에서 데이터가 변경되었습니다. 페이지를 새로고침한 뒤 다시 시도하세요.`
  }
  return message
}

export default function DashboardPage() {
  const { data, isLoading, error } = useProjects()
  const saveMutation = useSaveProjects()
  const [session, dispatch] = useReducer(sessionReducer, initialSession)
  const [notice, setNotice] = useState<Notice | null>(null)

  const dataset = data?.items ?? EMPTY
  const { filter, mode, buffer } = session
  const isEditing = mode === 'editing'
  const isSaving = saveMutation.isPending

  const departments = useMemo(() => distinctValues(dataset, 'department'), [dataset])
  const statuses = useMemo(() => distinctValues(dataset, 'status'), [dataset])
  const filtered = useMemo(() => filterRows(dataset, filter), [dataset, filter])
  const columns = visibleColumns(filter.hiddenColumns)

  if (isLoading) {
    return <div className="text-center py-12 text-gray-500">데이터를 불러오는 중...</div>
  }

  if (error || !data) {
    return (
      <div role="alert" className="text-center py-12 text-red-600">
        {error ? loadErrorMessage(error) : '데이터를 불러올 수 없습니다.'}
      </div>
    )
  }

  const handleToggleMode = () => {
    if (isSaving) return
    setNotice(null)
    if (isEditing) {
      dispatch({ type: 'exitEdit' })
    } else {
      dispatch({ type: 'enterEdit', visibleRows: filtered })
    }
  }

  const handleSave = () => {
    if (!buffer || isSaving) return

    let items: ProjectRecord[]
    try {
      items = commitEdits(data.items, buffer)
    } catch (err) {
      if (err instanceof EditCommitError) {
        setNotice({ kind: 'error', message: saveErrorMessage(err) })
        return
      }
      throw err
    }

    saveMutation.mutate(
      { base_version: data.version, items },
      {
        onSuccess: () => {
          dispatch({ type: 'saved' })
          setNotice({ kind: 'success', message: '데이터가 성공적으로 저장되었습니다!' })
        },
        onError: (err) => setNotice({ kind: 'error', message: saveErrorMessage(err) }),
      }
    )
  }

  return (
    <div className="flex gap-8">
      <FilterSidebar
        departments={departments}
        statuses={statuses}
        selection={filter}
        totalCount={data.items.length}
        visibleCount={filtered.length}
        rowFiltersDisabled={isEditing}
        onDepartmentChange={(department) => dispatch({ type: 'setDepartment', department })}
        onStatusChange={(status) => dispatch({ type: 'setStatus', status })}
        onToggleColumn={(column) => dispatch({ type: 'toggleColumn', column })}
      />

      <div className="min-w-0 flex-1 space-y-4">
        <div className="flex items-center justify-between">
          <h2 className="text-2xl font-bold text-gray-900">연구 프로젝트 관리 시스템</h2>
          <button
            type="button"
            role="switch"
            aria-checked={isEditing}
            disabled={isSaving}
            onClick={handleToggleMode}
            className="flex items-center gap-2 text-sm font-medium text-gray-700 disabled:opacity-50"
          >
            <span
              className={clsx(
                'inline-flex h-5 w-9 items-center rounded-full transition-colors',
                isEditing ? 'bg-blue-600' : 'bg-gray-300'
              )}
            >
              <span
                className={clsx(
                  'h-4 w-4 rounded-full bg-white shadow transition-transform',
                  isEditing ? 'translate-x-4' : 'translate-x-0.5'
                )}
              />
            </span>
            편집 모드
          </button>
        </div>

        {notice && (
          <div
            role={notice.kind === 'error' ? 'alert' : 'status'}
            className={clsx(
              'rounded-md px-4 py-2 text-sm',
              notice.kind === 'error' ? 'bg-red-50 text-red-700' : 'bg-green-50 text-green-700'
            )}
          >
            {notice.message}
          </div>
        )}

        {isEditing && buffer ? (
          <>
            <p className="rounded-md bg-yellow-50 px-4 py-2 text-sm text-yellow-800">
              ⚠️ 변경사항을 저장하지 않으면 수정한 내용이 사라집니다.
            </p>
            <EditableProjectTable
              rows={buffer.rows}
              columns={columns}
              onCellChange={(edit) => dispatch({ type: 'editCell', edit })}
              onAddRow={() => dispatch({ type: 'addRow' })}
              onRemoveRow={(key) => dispatch({ type: 'removeRow', key })}
              disabled={isSaving}
            />
            <button
              type="button"
              onClick={handleSave}
              disabled={isSaving}
              className="px-4 py-2 bg-blue-600 text-white text-sm font-medium rounded-md hover:bg-blue-700 disabled:opacity-50"
            >
              {isSaving ? '저장 중...' : '변경사항 저장'}
            </button>
          </>
        ) : (
          <ProjectTable
            rows={filtered.map((record) => projectRow(record, filter.hiddenColumns))}
            columns={columns}
          />
        )}
      </div>
    </div>
  )
}
