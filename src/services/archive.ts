import { randomUUID } from 'crypto'
import { FOLDER_MIMETYPE } from '../config/constants'
import { sanitizeFileName, toFolderName } from '../utils/string-utils'
import { ObjectBucket } from './bucket'

export interface ArchiveStore {
   resolveOrCreateContainer(parentContainerId: string, name: string): Promise<string>
   store(containerId: string, fileName: string, bytes: Buffer, mimeType: string): Promise<string>
}

// Container ids are key prefixes: '' for the bucket root, otherwise ending in '/'
const asPrefix = (containerId: string) =>
   !containerId || containerId.endsWith('/') ? containerId : `${containerId}/`

/**
 * Bill image archive on top of an object bucket.
 * Containers are folder prefixes, one per party, created on first use.
 */
export function createArchiveStore(bucket: ObjectBucket): ArchiveStore {
   return {
      /**
       * Finds the folder called `name` directly under the parent, or creates it.
       * The match is exact and case-sensitive; the first listed match wins.
       * @returns the container id (key prefix) of the folder.
       */
      async resolveOrCreateContainer(parentContainerId, name) {
         const parent = asPrefix(parentContainerId)
         const folderName = toFolderName(name)

         const existing = (await bucket.listFolders(parent)).find(folder => folder === folderName)
         const containerId = `${parent}${folderName}/`

         if (existing !== undefined) {
            log.debug({ containerId }, 'Archive folder found')
            return containerId
         }

         await bucket.putObject(containerId, Buffer.alloc(0), FOLDER_MIMETYPE)
         log.info({ containerId }, 'Archive folder created')
         return containerId
      },

      /**
       * Uploads a bill image into a container. A random prefix keeps repeated
       * uploads of the same file name side by side instead of overwriting.
       * @returns the public URL of the stored image.
       */
      async store(containerId, fileName, bytes, mimeType) {
         const prefix = randomUUID().replace(/-/g, '').slice(0, 8)
         const key = `${asPrefix(containerId)}${prefix}-${sanitizeFileName(fileName)}`

         await bucket.putObject(key, bytes, mimeType)
         log.info({ key, bytes: bytes.length }, 'Bill image archived')

         return bucket.urlFor(key)
      },
   }
}
