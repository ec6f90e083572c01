import { Context } from 'hono'
import { ACCEPTED_EXTENSIONS } from '../config/constants'
import { MAX_UPLOAD_BYTES } from '../config/settings'
import { image } from '../services/image'
import { BillImage } from '../types/bills'
import { UploadError } from '../utils/errors'

const hasAcceptedExtension = (fileName: string) => {
   const extension = fileName.split('.').pop()?.toLowerCase() ?? ''
   return ACCEPTED_EXTENSIONS.some(accepted => accepted === extension)
}

/**
 * Reads the `file` field of a multipart upload into a BillImage.
 * The content must really be a JPEG or PNG, whatever the browser claims.
 */
export async function readBillUpload(c: Context): Promise<BillImage> {
   const body = await c.req.parseBody()
   const file = body.file

   if (!(file instanceof File)) {
      throw new UploadError('Choose a bill image to upload.')
   }
   if (!hasAcceptedExtension(file.name)) {
      throw new UploadError(`${file.name} is not a .${ACCEPTED_EXTENSIONS.join(', .')} file.`)
   }
   if (file.size > MAX_UPLOAD_BYTES) {
      throw new UploadError(`${file.name} is larger than ${MAX_UPLOAD_BYTES / (1024 * 1024)} MB.`)
   }

   const bytes = Buffer.from(await file.arrayBuffer())
   const mimeType = await image.detectMimeType(bytes)
   if (!mimeType) {
      throw new UploadError(`${file.name} is not a readable JPEG or PNG image.`)
   }

   return { bytes, fileName: file.name, mimeType }
}
