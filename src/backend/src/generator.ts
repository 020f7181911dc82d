/**
 * Synthetic dataset generator. Produces schema-valid rows with random values
 * for demos and end-to-end checks of the file contract.
 */

import { addDays, startOfDay, subDays } from 'date-fns'
import { PROJECT_PHASES, PROJECT_STATUSES } from '../../shared/project'
import type { StoredProject } from './csvCodec'

export const INVESTIGATORS = [
  '김지원',
  '이성민',
  '박도현',
  '정수진',
  '최영호',
  '강민서',
  '윤지현',
  '송태호',
  '임하늘',
  '한소희',
] as const

export const DEPARTMENTS = [
  '생명과학부',
  '물리학과',
  '화학과',
  '컴퓨터공학과',
  '전자공학과',
  '기계공학과',
  '의학과',
  '약학과',
] as const

export const RESEARCH_AREAS = [
  '인공지능',
  '신약개발',
  '재생에너지',
  '나노기술',
  '로보틱스',
  '바이오테크',
  '양자컴퓨팅',
  '신소재',
] as const

const BUDGET_UNIT = 10_000

export interface GeneratorOptions {
  now?: Date
  /** Returns a float in [0, 1). */
  random?: () => number
}

export function projectId(n: number): string {
  return `PRJ-${String(n).padStart(3, '0')}`
}

export function generateProjects(
  count: number,
  { now = new Date(), random = Math.random }: GeneratorOptions = {}
): StoredProject[] {
  // Integer in [min, max).
  const randint = (min: number, max: number) => min + Math.floor(random() * (max - min))
  const pick = <T>(values: readonly T[]): T => values[randint(0, values.length)]
  const today = startOfDay(now)

  return Array.from({ length: count }, (_, idx) => ({
    project_id: projectId(idx + 1),
    project_name: `Research Project ${idx + 1}`,
    principal_investigator: pick(INVESTIGATORS),
    department: pick(DEPARTMENTS),
    start_date: subDays(today, randint(0, 365)),
    end_date: addDays(today, randint(30, 730)),
    budget: randint(5_000, 50_000) * BUDGET_UNIT,
    progress: randint(0, 101),
    research_area: pick(RESEARCH_AREAS),
    status: pick(PROJECT_STATUSES),
    current_phase: pick(PROJECT_PHASES),
    review_comments: '',
    action_items: '',
  }))
}
