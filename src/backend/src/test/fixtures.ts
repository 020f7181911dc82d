import { CSV_HEADERS, PROJECT_COLUMNS } from '../../../shared/project'

export const HEADER = PROJECT_COLUMNS.map((column) => CSV_HEADERS[column]).join(',')

export const ROW_1 =
  'PRJ-001,Research Project 1,김지원,물리학과,2024-01-05,2025-06-30,100000000,40,인공지능,진행중,실험,,'
export const ROW_2 =
  'PRJ-002,Research Project 2,이성민,화학과,2024-02-10,2025-12-31,250000000,100,신소재,완료,논문작성,"좋음, 계속 진행",특허 검토'
export const ROW_3 =
  'PRJ-003,Research Project 3,박도현,물리학과,2023-11-20,2026-03-01,75000000,0,나노기술,준비중,계획,,'

/** File contents in the form the store writes them. */
export const SAMPLE_CSV = `\uFEFF${[HEADER, ROW_1, ROW_2, ROW_3].join('\n')}\n`
