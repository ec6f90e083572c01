import { z } from 'zod'
import { VISION_MODEL } from './settings'
import { InitializationError } from '../utils/errors'

const required = (name: string) =>
   z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`)

const envSchema = z.object({
   OPENAI_API_KEY: required('OPENAI_API_KEY'),
   OPENAI_MODEL: z.string().trim().min(1).default(VISION_MODEL),
   AWS_REGION: required('AWS_REGION'),
   AWS_ACCESS_KEY: required('AWS_ACCESS_KEY'),
   AWS_SECRET_KEY: required('AWS_SECRET_KEY'),
   AWS_BUCKET_NAME: required('AWS_BUCKET_NAME'),
   // Folder prefix the per-party archive folders live under
   ARCHIVE_ROOT: z.string().trim().default('bills/')
      .transform(root => root && !root.endsWith('/') ? `${root}/` : root),
   LEDGER_KEY: z.string().trim().min(1).default('ledgers/bills.xlsx'),
   PORT: z.coerce.number().int().positive().default(3000),
})

export type Env = z.infer<typeof envSchema>

/**
 * Validates the environment and returns the typed configuration.
 * Every missing or invalid variable is reported at once.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
   const result = envSchema.safeParse(source)

   if (!result.success) {
      const problems = result.error.issues.map(issue =>
         issue.message.includes(String(issue.path[0]))
            ? issue.message
            : `${issue.path.join('.')}: ${issue.message}`
      )
      throw new InitializationError(
         `Invalid environment configuration: ${problems.join('; ')}`
      )
   }

   return result.data
}
