import { describe, it, expect } from 'vitest'
import { http, HttpResponse } from 'msw'
import { projectsApi } from './projects'
import { ApiError } from './client'
import { server } from '../test/mocks/server'
import { API_BASE, mockProjects } from '../test/mocks/handlers'

describe('projectsApi', () => {
  describe('list', () => {
    it('should fetch the whole dataset with its version', async () => {
      const result = await projectsApi.list()

      expect(result.items).toEqual(mockProjects)
      expect(result.total).toBe(4)
      expect(result.version).toBe(1)
    })

    it('should throw an ApiError carrying the error code', async () => {
      server.use(
        http.get(`${API_BASE}/api/v1/projects`, () =>
          HttpResponse.json(
            {
              error: {
                code: 'FILE_NOT_FOUND',
                message: 'Data file not found: /data/missing.csv',
                details: { path: '/data/missing.csv' },
              },
            },
            { status: 404 }
          )
        )
      )

      const error = await projectsApi.list().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(ApiError)
      expect(error).toMatchObject({
        status: 404,
        code: 'FILE_NOT_FOUND',
        message: 'Data file not found: /data/missing.csv',
        details: { path: '/data/missing.csv' },
      })
    })

    it('should fall back to the status text when the body is not JSON', async () => {
      server.use(
        http.get(
          `${API_BASE}/api/v1/projects`,
          () => new HttpResponse('oops', { status: 500, statusText: 'Server Error' })
        )
      )

      await expect(projectsApi.list()).rejects.toThrow('500 Server Error')
    })
  })

  describe('save', () => {
    it('should replace the dataset and bump the version', async () => {
      const items = mockProjects.slice(1)
      const result = await projectsApi.save({ base_version: 1, items })

      expect(result.items).toEqual(items)
      expect(result.total).toBe(3)
      expect(result.version).toBe(2)
    })

    it('should reject a save against an old version', async () => {
      await projectsApi.save({ base_version: 1, items: mockProjects })

      await expect(projectsApi.save({ base_version: 1, items: mockProjects })).rejects.toMatchObject({
        status: 409,
        code: 'STALE_VERSION',
      })
    })
  })
})
