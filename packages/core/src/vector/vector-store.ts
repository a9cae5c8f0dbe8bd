import { z } from 'zod'
import { CategoryIdSchema } from '../patterns/index.js'
import type { CategoryId } from '../patterns/index.js'

export const VectorRecordTypeSchema = z.enum(['case', 'article'])
export type VectorRecordType = z.infer<typeof VectorRecordTypeSchema>

/** Denormalized fields carried with each vector so search needs no joins. */
export const VectorMetadataSchema = z.object({
  type: VectorRecordTypeSchema,
  category: CategoryIdSchema.nullable(),
  /** Case updatedAt or article generatedAt. */
  timestamp: z.string(),
  /** Case status (open/closed/resolved) or article vector status. */
  status: z.string(),
  title: z.string(),
  preview: z.string(),
  resolutionQuality: z.number().min(0).max(1),
  /** Contributing cases of an article; the case itself for a case record. */
  caseIds: z.array(z.string()),
  productHierarchyId: z.string().nullable(),
})

export type VectorMetadata = z.infer<typeof VectorMetadataSchema>

export interface VectorWhere {
  type?: VectorRecordType
  status?: string
  category?: CategoryId
  productHierarchyId?: string
}

export interface VectorMatch {
  id: string
  /** Non-negative; smaller is closer. */
  distance: number
  metadata: VectorMetadata
}

/**
 * Nearest-neighbour store. Implementations reject with STORE_UNAVAILABLE
 * on backend failure.
 */
export interface VectorStore {
  upsert(id: string, vector: readonly number[], metadata: VectorMetadata): Promise<void>
  /** Up to k matches ordered by distance ascending. */
  query(vector: readonly number[], k: number, where?: VectorWhere): Promise<VectorMatch[]>
  delete(id: string): Promise<boolean>
  count(where?: VectorWhere): Promise<number>
}
