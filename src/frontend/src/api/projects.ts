import { apiRequest } from './client'
import type { DatasetResponse, SaveDatasetRequest } from '../types/project'

const BASE_PATH = '/api/v1/projects'

export const projectsApi = {
  list: async (): Promise<DatasetResponse> => {
    return apiRequest<DatasetResponse>(BASE_PATH)
  },

  save: async (data: SaveDatasetRequest): Promise<DatasetResponse> => {
    return apiRequest<DatasetResponse>(BASE_PATH, {
      method: 'PUT',
      body: JSON.stringify(data),
    })
  },
}
