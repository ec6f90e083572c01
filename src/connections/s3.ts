import { S3Client, HeadBucketCommand } from '@aws-sdk/client-s3'
import { Env } from '../config/env'

// S3 client instance
export let s3Client: S3Client

export async function initializeS3(env: Env): Promise<S3Client> {
   s3Client = new S3Client({
      region: env.AWS_REGION,
      credentials: {
         accessKeyId: env.AWS_ACCESS_KEY,
         secretAccessKey: env.AWS_SECRET_KEY,
      },
   })

   // verify the credentials and that the bucket is reachable
   await s3Client.send(new HeadBucketCommand({ Bucket: env.AWS_BUCKET_NAME }))
   log.info({ bucket: env.AWS_BUCKET_NAME }, 'S3 client initialized')

   return s3Client
}
