import sharp from 'sharp'
import { MODEL_IMAGE } from '../config/settings'
import { ImageMimeType } from '../types/bills'

const PREVIEW_WIDTH = 300
const PAPER_WHITE = '#ffffff'

const MIME_BY_FORMAT: Record<string, ImageMimeType> = {
   jpeg: 'image/jpeg',
   png: 'image/png',
}

export const image = {
   /**
    * Reads the actual format of an uploaded file and decodes it once in full,
    * so a truncated or corrupt image is caught here and not mid-pipeline.
    * @returns the mime type, or `null` when the bytes are not a readable JPEG or PNG image.
    */
   async detectMimeType(bytes: Buffer): Promise<ImageMimeType | null> {
      try {
         const { format } = await sharp(bytes).metadata()
         const mimeType = (format && MIME_BY_FORMAT[format]) || null
         if (mimeType) await sharp(bytes).stats()
         return mimeType
      } catch (error) {
         log.debug({ err: error }, 'Upload is not a readable image')
         return null
      }
   },

   /**
    * Prepares a bill photo for the vision model: applies the EXIF rotation,
    * fits it inside a square of `MODEL_IMAGE.maxSide`, puts transparent areas
    * on white and re-encodes as JPEG. An upright JPEG that already fits is sent as is.
    */
   async forModel(bytes: Buffer, mimeType?: string): Promise<{ data: Buffer, mimeType: ImageMimeType }> {
      if (mimeType === 'image/jpeg') {
         const { width = 0, height = 0, orientation = 1 } = await sharp(bytes).metadata()
         if (Math.max(width, height) <= MODEL_IMAGE.maxSide && orientation === 1) {
            return { data: bytes, mimeType: 'image/jpeg' }
         }
      }

      const data = await sharp(bytes)
         .rotate()
         .resize({
            width: MODEL_IMAGE.maxSide,
            height: MODEL_IMAGE.maxSide,
            fit: 'inside',
            withoutEnlargement: true,
         })
         .flatten({ background: PAPER_WHITE })
         .jpeg({ quality: MODEL_IMAGE.jpegQuality })
         .toBuffer()

      return { data, mimeType: 'image/jpeg' }
   },

   /**
    * Small JPEG preview for the result page, as a data URL.
    */
   async previewDataUrl(bytes: Buffer): Promise<string> {
      const data = await sharp(bytes)
         .rotate()
         .resize({ width: PREVIEW_WIDTH, withoutEnlargement: true })
         .flatten({ background: PAPER_WHITE })
         .jpeg({ quality: 70 })
         .toBuffer()
      return `data:image/jpeg;base64,${data.toString('base64')}`
   },
}
