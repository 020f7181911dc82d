import { describe, it, expect } from 'vitest'
import { act, renderHook, waitFor } from '@testing-library/react'
import { QueryClientProvider } from '@tanstack/react-query'
import type { ReactNode } from 'react'
import { PROJECTS_KEY, useProjects, useSaveProjects } from './useProjects'
import { mockProjects } from '../test/mocks/handlers'
import { createTestQueryClient } from '../test/utils'
import type { DatasetResponse } from '../types/project'

function createWrapper() {
  const queryClient = createTestQueryClient()
  function Wrapper({ children }: { children: ReactNode }) {
    return <QueryClientProvider client={queryClient}>{children}</QueryClientProvider>
  }
  return { queryClient, Wrapper }
}

describe('useProjects', () => {
  it('should fetch the dataset', async () => {
    const { Wrapper } = createWrapper()
    const { result } = renderHook(() => useProjects(), { wrapper: Wrapper })

    await waitFor(() => expect(result.current.isSuccess).toBe(true))

    expect(result.current.data?.items).toHaveLength(mockProjects.length)
    expect(result.current.data?.version).toBe(1)
  })
})

describe('useSaveProjects', () => {
  it('should store the saved dataset in the cache', async () => {
    const { queryClient, Wrapper } = createWrapper()
    const { result } = renderHook(() => useSaveProjects(), { wrapper: Wrapper })

    const items = mockProjects.slice(0, 2)
    await act(async () => {
      await result.current.mutateAsync({ base_version: 1, items })
    })

    const cached = queryClient.getQueryData<DatasetResponse>([PROJECTS_KEY])
    expect(cached?.items).toEqual(items)
    expect(cached?.version).toBe(2)
  })

  it('should report a stale save as an error', async () => {
    const { Wrapper } = createWrapper()
    const { result } = renderHook(() => useSaveProjects(), { wrapper: Wrapper })

    act(() => {
      result.current.mutate({ base_version: 7, items: mockProjects })
    })

    await waitFor(() => expect(result.current.isError).toBe(true))
    expect(result.current.error).toMatchObject({ code: 'STALE_VERSION' })
  })
})
