import { useQuery, useMutation, useQueryClient } from '@tanstack/react-query'
import { projectsApi } from '../api/projects'
import type { SaveDatasetRequest } from '../types/project'

export const PROJECTS_KEY = 'projects'

/** Loads the dataset once per session; only a save refreshes it. */
export function useProjects() {
  return useQuery({
    queryKey: [PROJECTS_KEY],
    queryFn: () => projectsApi.list(),
    staleTime: Infinity,
  })
}

export function useSaveProjects() {
  const queryClient = useQueryClient()

  return useMutation({
    mutationFn: (data: SaveDatasetRequest) => projectsApi.save(data),
    onSuccess: (saved) => {
      queryClient.setQueryData([PROJECTS_KEY], saved)
      return queryClient.invalidateQueries({ queryKey: [PROJECTS_KEY] })
    },
  })
}
