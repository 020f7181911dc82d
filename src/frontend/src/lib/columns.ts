import { PROJECT_PHASES, PROJECT_STATUSES, type ProjectColumn } from '../types/project'

export type ColumnWidget =
  | { kind: 'text' }
  | { kind: 'date' }
  | { kind: 'number' }
  | { kind: 'progress'; min: number; max: number }
  | { kind: 'select'; options: readonly string[] }

export interface ColumnConfig {
  label: string
  widget: ColumnWidget
  width: 'small' | 'medium'
  help?: string
}

const TEXT: ColumnWidget = { kind: 'text' }
const DATE: ColumnWidget = { kind: 'date' }

export const COLUMN_CONFIG: Record<ProjectColumn, ColumnConfig> = {
  project_id: { label: '프로젝트 ID', widget: TEXT, width: 'small' },
  project_name: { label: '프로젝트명', widget: TEXT, width: 'medium' },
  principal_investigator: { label: '책임자', widget: TEXT, width: 'small' },
  department: { label: '부서', widget: TEXT, width: 'small' },
  start_date: { label: '시작일', widget: DATE, width: 'small' },
  end_date: { label: '종료일', widget: DATE, width: 'small' },
  budget: { label: '예산', widget: { kind: 'number' }, width: 'small' },
  progress: { label: '진행률', widget: { kind: 'progress', min: 0, max: 100 }, width: 'small' },
  research_area: { label: '연구분야', widget: TEXT, width: 'small' },
  status: { label: '상태', widget: { kind: 'select', options: PROJECT_STATUSES }, width: 'small' },
  current_phase: {
    label: '현재단계',
    widget: { kind: 'select', options: PROJECT_PHASES },
    width: 'small',
  },
  review_comments: {
    label: '검토 의견',
    widget: TEXT,
    width: 'medium',
    help: '프로젝트에 대한 검토 의견을 입력하세요',
  },
  action_items: {
    label: '조치 사항',
    widget: TEXT,
    width: 'medium',
    help: '필요한 조치 사항을 입력하세요',
  },
}

export const widthStyles: Record<ColumnConfig['width'], string> = {
  small: 'min-w-[7rem]',
  medium: 'min-w-[14rem]',
}

export function columnLabel(column: ProjectColumn): string {
  return COLUMN_CONFIG[column].label
}

const budgetFormat = new Intl.NumberFormat('ko-KR')

export function formatBudget(value: number): string {
  return `${budgetFormat.format(value)}원`
}
