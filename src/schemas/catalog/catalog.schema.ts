import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { z } from 'zod'

export const CatalogItemSchema = z.object({
  id: z.number().int(),
  seriesItemDbId: z.number().int(),
  seriesTitle: z.string(),
  seriesType: z.string(),
  seriesStatus: z.string(),
  seriesEpisodes: z.number().int().nonnegative(),
  seriesVolumes: z.number().int().nonnegative(),
  seriesDateBegin: z.string(),
  seriesDateEnd: z.string(),
  imageUrl: z.string(),
  seriesSynonyms: z.array(z.string()),
  seriesSynopsis: z.string(),
  episodes: z.number().int().nonnegative(),
  volumes: z.number().int().nonnegative(),
  status: z.number().int(),
  score: z.number().nonnegative(),
  dateStart: z.string(),
  dateFinish: z.string(),
  tags: z.array(z.string()),
  downloadedItems: z.number().int().nonnegative(),
  enableReconsuming: z.boolean(),
  rewatchEpisode: z.number().int().nonnegative(),
  lastUpdated: z.number().int(),
})

/** Fields a client may send on update/add; the rest come from the stores */
export const CatalogItemChangesSchema = CatalogItemSchema.omit({
  seriesItemDbId: true,
}).partial()

export const ItemParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const ListQuerySchema = z.object({
  refresh: z.enum(['true', 'false']).default('false'),
})

export const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, 'Search terms are required'),
})

export const ItemsResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  items: z.array(CatalogItemSchema),
})

export const MutationResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
})

export type CatalogItemChanges = z.infer<typeof CatalogItemChangesSchema>
export type ItemsResponse = z.infer<typeof ItemsResponseSchema>
export type MutationResponse = z.infer<typeof MutationResponseSchema>

// Re-export shared error schema with domain-specific alias
export { ErrorSchema as CatalogErrorSchema }
