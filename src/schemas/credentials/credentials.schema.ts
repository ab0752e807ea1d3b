import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { z } from 'zod'

export const CredentialsStatusSchema = z.object({
  username: z.string(),
  credentialsNeeded: z.boolean(),
})

export const CredentialsBodySchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
})

export type CredentialsStatus = z.infer<typeof CredentialsStatusSchema>
export type CredentialsBody = z.infer<typeof CredentialsBodySchema>

export { ErrorSchema as CredentialsErrorSchema }
