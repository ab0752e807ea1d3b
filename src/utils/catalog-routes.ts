import {
  type CatalogItemChanges,
  CatalogErrorSchema,
  CatalogItemChangesSchema,
  type ItemsResponse,
  ItemParamsSchema,
  ItemsResponseSchema,
  ListQuerySchema,
  type MutationResponse,
  MutationResponseSchema,
  SearchQuerySchema,
} from '@schemas/catalog/catalog.schema.js'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import {
  type CatalogFailure,
  type CatalogItem,
  type CatalogKind,
  createEmptyItem,
} from '@root/types/catalog.types.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

type ItemParams = z.infer<typeof ItemParamsSchema>

const CREDENTIALS_MESSAGE =
  'Catalog credentials are missing or were rejected; update them at PUT /v1/credentials'

/**
 * 401 when the catalog asked for credentials on this call, otherwise 502
 */
function failurePayload(failure: CatalogFailure): ErrorResponse {
  if (failure.reason === 'credentials') {
    return {
      statusCode: 401,
      code: 'CREDENTIALS_NEEDED',
      error: 'Unauthorized',
      message: CREDENTIALS_MESSAGE,
    }
  }
  return {
    statusCode: 502,
    code: 'CATALOG_UNAVAILABLE',
    error: 'Bad Gateway',
    message: `Catalog request failed: ${failure.message}`,
  }
}

/**
 * Builds the list, search, mutation and image routes for one catalog kind.
 * Each kind's directory registers the result as its route plugin.
 */
export function createCatalogRoutes(kind: CatalogKind): FastifyPluginAsync {
  const tag = kind === 'anime' ? 'Anime' : 'Manga'

  return async (fastify) => {
    const mergeItem = (
      id: number,
      changes: CatalogItemChanges,
    ): CatalogItem => ({
      ...(fastify.catalog.findItem(kind, id) ?? createEmptyItem()),
      ...changes,
      seriesItemDbId: id,
    })

    fastify.get<{
      Querystring: z.infer<typeof ListQuerySchema>
      Reply: ItemsResponse | ErrorResponse
    }>(
      '/list',
      {
        schema: {
          summary: `Get the ${kind} list`,
          operationId: `get${tag}List`,
          description: `Returns the stored ${kind} list, refetching it from the catalog first when refresh=true`,
          querystring: ListQuerySchema,
          response: {
            200: ItemsResponseSchema,
            401: CatalogErrorSchema,
            500: CatalogErrorSchema,
            502: CatalogErrorSchema,
          },
          tags: [tag],
        },
      },
      async (request, reply) => {
        try {
          if (request.query.refresh === 'true') {
            const { value: items, failure } =
              await fastify.catalog.fetchListResult(kind)
            if (failure) {
              const payload = failurePayload(failure)
              return reply.status(payload.statusCode).send(payload)
            }
            return {
              success: true,
              message: `Fetched ${items.length} ${kind} items`,
              items,
            }
          }

          const items = fastify.catalog.getItems(kind, 'list')
          return {
            success: true,
            message: `${items.length} ${kind} items in list`,
            items,
          }
        } catch (error) {
          logRouteError(fastify.log, request, error, {
            message: `Failed to load ${kind} list`,
          })
          throw error
        }
      },
    )

    fastify.get<{
      Querystring: z.infer<typeof SearchQuerySchema>
      Reply: ItemsResponse | ErrorResponse
    }>(
      '/search',
      {
        schema: {
          summary: `Search the ${kind} catalog`,
          operationId: `search${tag}`,
          querystring: SearchQuerySchema,
          response: {
            200: ItemsResponseSchema,
            401: CatalogErrorSchema,
            500: CatalogErrorSchema,
            502: CatalogErrorSchema,
          },
          tags: [tag],
        },
      },
      async (request, reply) => {
        try {
          const { value: items, failure } = await fastify.catalog.searchResult(
            kind,
            request.query.q,
          )
          if (failure) {
            const payload = failurePayload(failure)
            return reply.status(payload.statusCode).send(payload)
          }
          return {
            success: true,
            message: `Found ${items.length} ${kind} items`,
            items,
          }
        } catch (error) {
          logRouteError(fastify.log, request, error, {
            message: `Failed to search ${kind}`,
            terms: request.query.q,
          })
          throw error
        }
      },
    )

    const mutation = async (
      operation: 'update' | 'add',
      id: number,
      changes: CatalogItemChanges,
    ): Promise<{ statusCode: number; response: MutationResponse }> => {
      const item = mergeItem(id, changes)
      const { value: success, failure } =
        operation === 'update'
          ? await fastify.catalog.updateItemResult(kind, item)
          : await fastify.catalog.addItemResult(kind, item)

      if (success) {
        const verb = operation === 'update' ? 'Updated' : 'Added'
        return {
          statusCode: 200,
          response: { success: true, message: `${verb} ${kind} ${id}` },
        }
      }

      if (failure?.reason === 'credentials') {
        return {
          statusCode: 401,
          response: { success: false, message: CREDENTIALS_MESSAGE },
        }
      }
      return {
        statusCode: 502,
        response: {
          success: false,
          message: `Catalog did not accept the ${operation} of ${kind} ${id}`,
        },
      }
    }

    const mutationSchema = (operation: 'update' | 'add') => ({
      summary:
        operation === 'update'
          ? `Update a ${kind} list entry`
          : `Add a ${kind} to the list`,
      operationId: `${operation}${tag}Item`,
      params: ItemParamsSchema,
      body: CatalogItemChangesSchema,
      response: {
        200: MutationResponseSchema,
        401: MutationResponseSchema,
        502: MutationResponseSchema,
        500: CatalogErrorSchema,
      },
      tags: [tag],
    })

    fastify.put<{
      Params: ItemParams
      Body: CatalogItemChanges
      Reply: MutationResponse
    }>(
      '/items/:id',
      { schema: mutationSchema('update') },
      async (request, reply) => {
        try {
          const { statusCode, response } = await mutation(
            'update',
            request.params.id,
            request.body,
          )
          return reply.status(statusCode).send(response)
        } catch (error) {
          logRouteError(fastify.log, request, error, {
            message: `Failed to update ${kind}`,
            seriesItemDbId: request.params.id,
          })
          throw error
        }
      },
    )

    fastify.post<{
      Params: ItemParams
      Body: CatalogItemChanges
      Reply: MutationResponse
    }>(
      '/items/:id',
      { schema: mutationSchema('add') },
      async (request, reply) => {
        try {
          const { statusCode, response } = await mutation(
            'add',
            request.params.id,
            request.body,
          )
          return reply.status(statusCode).send(response)
        } catch (error) {
          logRouteError(fastify.log, request, error, {
            message: `Failed to add ${kind}`,
            seriesItemDbId: request.params.id,
          })
          throw error
        }
      },
    )

    fastify.get<{ Params: ItemParams }>(
      '/items/:id/image',
      {
        schema: {
          summary: `Get a ${kind} cover image`,
          operationId: `get${tag}Image`,
          params: ItemParamsSchema,
          tags: [tag],
        },
      },
      async (request, reply) => {
        try {
          const item = fastify.catalog.findItem(kind, request.params.id)
          if (!item) {
            return reply.notFound(
              `No ${kind} ${request.params.id} in list or search results`,
            )
          }

          const image = await fastify.catalog.fetchImage(kind, item)
          if (!image) {
            return reply.notFound(
              `No image available for ${kind} ${request.params.id}`,
            )
          }

          return reply.type('application/octet-stream').send(image)
        } catch (error) {
          logRouteError(fastify.log, request, error, {
            message: `Failed to fetch ${kind} image`,
            seriesItemDbId: request.params.id,
          })
          throw error
        }
      },
    )
  }
}
