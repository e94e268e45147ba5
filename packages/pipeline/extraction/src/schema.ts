import { z } from "zod"

// non-string noise becomes a blank and is dropped by the normalizer
const looseText = z.preprocess((value) => (typeof value === "string" ? value : ""), z.string())
const optionalText = z.preprocess((value) => (typeof value === "string" ? value : null), z.string().nullable())

export const extractedEntitySchema = z.object({
  text: looseText,
  type: optionalText,
})

export const extractedTripleSchema = z.object({
  head: looseText,
  relation: looseText,
  tail: looseText,
  confidence: z.number().optional().catch(undefined),
})

export const extractionResponseSchema = z.object({
  entities: z.array(extractedEntitySchema).default([]),
  triples: z.array(extractedTripleSchema).default([]),
})

export type ExtractionResponse = z.infer<typeof extractionResponseSchema>
