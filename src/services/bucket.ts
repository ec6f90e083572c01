import {
   S3Client,
   GetObjectCommand,
   ListObjectsV2Command,
   NoSuchKey,
   PutObjectCommand,
} from '@aws-sdk/client-s3'

/**
 * The slice of object storage the archive and the ledger need.
 * Keys use `/` as the folder separator, folder names end with `/`.
 */
export interface ObjectBucket {
   /** Names of the direct child folders of `prefix`, in listing order. */
   listFolders(prefix: string): Promise<string[]>
   putObject(key: string, body: Buffer, contentType: string): Promise<void>
   /** `null` when the key does not exist. */
   getObject(key: string): Promise<Buffer | null>
   /** Public HTTPS address of an object, for people to open. */
   urlFor(key: string): string
}

interface S3BucketOptions {
   bucket: string
   region: string
}

export function s3Bucket(client: S3Client, { bucket, region }: S3BucketOptions): ObjectBucket {
   return {
      async listFolders(prefix) {
         const folders: string[] = []
         let ContinuationToken: string | undefined

         do {
            const page = await client.send(new ListObjectsV2Command({
               Bucket: bucket,
               Prefix: prefix,
               Delimiter: '/',
               ContinuationToken,
            }))

            for (const { Prefix } of page.CommonPrefixes ?? []) {
               if (Prefix) folders.push(Prefix.slice(prefix.length, -1))
            }
            ContinuationToken = page.IsTruncated ? page.NextContinuationToken : undefined
         } while (ContinuationToken)

         return folders
      },

      async putObject(key, body, contentType) {
         await client.send(new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentType: contentType,
         }))
         log.debug({ key, bytes: body.length }, 'Object stored in S3')
      },

      async getObject(key) {
         try {
            const { Body } = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }))
            if (!Body) return null
            return Buffer.from(await Body.transformToByteArray())
         } catch (error) {
            if (error instanceof NoSuchKey) return null
            throw error
         }
      },

      urlFor(key) {
         const path = key.split('/').map(encodeURIComponent).join('/')
         return `https://${bucket}.s3.${region}.amazonaws.com/${path}`
      },
   }
}
