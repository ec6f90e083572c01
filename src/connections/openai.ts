import OpenAI from 'openai'
import { Env } from '../config/env'

// OpenAI client instance
export let openai: OpenAI

export async function initializeOpenAI(env: Env): Promise<OpenAI> {
   openai = new OpenAI({ apiKey: env.OPENAI_API_KEY })

   // verify the key and that the configured model is available to it
   const model = await openai.models.retrieve(env.OPENAI_MODEL)
   log.info({ model: model.id }, 'OpenAI client initialized')

   return openai
}
