import { describe, it, expect } from 'vitest'
import { render, screen, within } from '@testing-library/react'
import { ProjectTable } from './ProjectTable'
import { projectRow } from '../lib/filter'
import { mockProjects } from '../test/mocks/handlers'

describe('ProjectTable', () => {
  it('should render headers for the given columns only', () => {
    render(
      <ProjectTable
        rows={[projectRow(mockProjects[0], [])]}
        columns={['project_id', 'project_name', 'budget']}
      />
    )

    const headers = screen.getAllByRole('columnheader').map((h) => h.textContent)
    expect(headers).toEqual(['프로젝트 ID', '프로젝트명', '예산'])
  })

  it('should format budget and progress', () => {
    const row = projectRow(mockProjects[3], [])
    render(<ProjectTable rows={[row]} columns={['budget', 'progress']} />)

    expect(screen.getByText('120,000,000원')).toBeInTheDocument()
    expect(screen.getByRole('progressbar')).toHaveAttribute('aria-valuenow', '65')
    expect(screen.getByText('65%')).toBeInTheDocument()
  })

  it('should render one body row per record', () => {
    const rows = mockProjects.map((p) => projectRow(p, []))
    render(<ProjectTable rows={rows} columns={['project_id']} />)

    const body = screen.getAllByRole('rowgroup')[1]
    expect(within(body).getAllByRole('row')).toHaveLength(4)
  })

  it('should show an empty state', () => {
    render(<ProjectTable rows={[]} columns={['project_id']} />)

    expect(screen.getByText('표시할 프로젝트가 없습니다.')).toBeInTheDocument()
  })
})
