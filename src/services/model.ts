import OpenAI from 'openai'
import { image } from './image'

/**
 * The single capability the stages need from a vision-language model:
 * an image plus an instruction in, free text out.
 */
export interface ModelClient {
   generate(prompt: string, imageBytes: Buffer, mimeType: string): Promise<string>
}

/**
 * ModelClient backed by OpenAI chat completions with image input.
 * The photo is normalized to a bounded JPEG first, unless `mimeType` says
 * it already is one that fits.
 */
export function openaiModel(client: OpenAI, model: string): ModelClient {
   return {
      async generate(prompt, imageBytes, mimeType) {
         const prepared = await image.forModel(imageBytes, mimeType)
         log.debug(
            { model, mimeType, bytes: imageBytes.length, sentBytes: prepared.data.length },
            'Sending bill image to the model'
         )

         const response = await client.chat.completions.create({
            model,
            messages: [
               {
                  role: 'user',
                  content: [
                     { type: 'text', text: prompt },
                     {
                        type: 'image_url',
                        image_url: {
                           url: `data:${prepared.mimeType};base64,${prepared.data.toString('base64')}`,
                        },
                     },
                  ],
               },
            ],
         })

         return response.choices[0]?.message.content ?? ''
      },
   }
}
