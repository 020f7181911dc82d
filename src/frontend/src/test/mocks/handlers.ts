import { http, HttpResponse } from 'msw'
import type {
  ApiErrorPayload,
  DatasetResponse,
  ProjectRecord,
  SaveDatasetRequest,
} from '../../types/project'

export const API_BASE = 'http://localhost:8000'

export const mockProjects: ProjectRecord[] = [
  {
    project_id: 'PRJ-001',
    project_name: '양자 센서 개발',
    principal_investigator: '김연구',
    department: '물리학과',
    start_date: '2025-01-01',
    end_date: '2025-12-31',
    budget: 100_000_000,
    progress: 40,
    research_area: '양자역학',
    status: '진행중',
    current_phase: '실험',
    review_comments: '',
    action_items: '',
  },
  {
    project_id: 'PRJ-002',
    project_name: '촉매 합성 연구',
    principal_investigator: '이연구',
    department: '화학과',
    start_date: '2024-03-01',
    end_date: '2025-02-28',
    budget: 80_000_000,
    progress: 100,
    research_area: '유기화학',
    status: '완료',
    current_phase: '논문작성',
    review_comments: '좋음, 계속 진행',
    action_items: '특허 검토',
  },
  {
    project_id: 'PRJ-003',
    project_name: '레이저 광학 연구',
    principal_investigator: '박연구',
    department: '물리학과',
    start_date: '2025-06-01',
    end_date: '2026-05-31',
    budget: 50_000_000,
    progress: 0,
    research_area: '광학',
    status: '준비중',
    current_phase: '계획',
    review_comments: '',
    action_items: '',
  },
  {
    project_id: 'PRJ-004',
    project_name: '딥러닝 최적화',
    principal_investigator: '최연구',
    department: '컴퓨터공학과',
    start_date: '2025-02-01',
    end_date: '2026-01-31',
    budget: 120_000_000,
    progress: 65,
    research_area: '인공지능',
    status: '진행중',
    current_phase: '분석',
    review_comments: '',
    action_items: '',
  },
]

let dataset: ProjectRecord[] = mockProjects.map((p) => ({ ...p }))
let version = 1

/** Restores the in-memory dataset that the handlers serve. */
export function resetMockDataset() {
  dataset = mockProjects.map((p) => ({ ...p }))
  version = 1
}

export function currentMockDataset(): ProjectRecord[] {
  return dataset
}

function datasetResponse(): DatasetResponse {
  return { items: dataset, total: dataset.length, version }
}

export const handlers = [
  http.get(`${API_BASE}/api/v1/projects`, () => {
    return HttpResponse.json(datasetResponse())
  }),

  http.put<Record<string, never>, SaveDatasetRequest>(
    `${API_BASE}/api/v1/projects`,
    async ({ request }) => {
      const body = await request.json()

      if (body.base_version !== version) {
        const payload: ApiErrorPayload = {
          error: {
            code: 'STALE_VERSION',
            message: 'Dataset changed since it was loaded',
            details: { baseVersion: body.base_version, currentVersion: version },
          },
        }
        return HttpResponse.json(payload, { status: 409 })
      }

      dataset = body.items
      version += 1
      return HttpResponse.json(datasetResponse())
    }
  ),
]
