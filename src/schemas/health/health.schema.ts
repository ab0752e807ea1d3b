import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'degraded']),
  timestamp: z.string(),
  checks: z.object({
    credentials: z.enum(['ok', 'needed']),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
