import OpenAI from 'openai'
import { S3Client } from '@aws-sdk/client-s3'
import { Env } from '../config/env'
import { InitializationError } from '../utils/errors'
import { initializeOpenAI } from './openai'
import { initializeS3 } from './s3'

export interface Connections {
   openai: OpenAI
   s3: S3Client
}

// Shared by every caller, including concurrent first callers
let connecting: Promise<Connections> | undefined

/**
 * Creates the external clients once per process.
 * A failure is an InitializationError; the next call starts over.
 */
export function initializeConnections(env: Env): Promise<Connections> {
   if (!connecting) {
      connecting = connect(env).catch(error => {
         connecting = undefined
         throw error instanceof InitializationError
            ? error
            : new InitializationError(
               `Failed to initialize external clients: ${error instanceof Error ? error.message : String(error)}`,
               { cause: error }
            )
      })
   }
   return connecting
}

async function connect(env: Env): Promise<Connections> {
   const [openai, s3] = await Promise.all([
      initializeOpenAI(env),
      initializeS3(env),
   ])
   return { openai, s3 }
}
