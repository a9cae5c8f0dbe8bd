/**
 * Zod schemas and types for support cases.
 * Cases are owned by external ingestion; the core reads them and derives
 * category assignments and knowledge articles from them.
 */

import { z } from 'zod'
import { ExternalIdSchema, TimestampSchema } from '../common/index.js'
import type { CaseKBError, Result } from '../common/index.js'

export const CaseStatusSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['open', 'closed', 'resolved']),
)

export type CaseStatus = z.infer<typeof CaseStatusSchema>

export const CaseInputSchema = z
  .object({
    id: ExternalIdSchema,
    subject: z.string().default(''),
    issue: z.string().default(''),
    resolution: z.string().default(''),
    status: CaseStatusSchema,
    productHierarchyId: z.string().nullable().default(null),
    productName: z.string().nullable().default(null),
    createdAt: TimestampSchema,
    resolvedAt: TimestampSchema.nullable().default(null),
    updatedAt: TimestampSchema.optional(),
  })
  .refine((c) => c.subject.trim().length > 0 || c.issue.trim().length > 0, {
    message: 'Case requires subject or issue text',
    path: ['issue'],
  })

export type CaseInput = z.input<typeof CaseInputSchema>

export interface Case {
  id: string
  subject: string
  issue: string
  resolution: string
  status: CaseStatus
  productHierarchyId: string | null
  productName: string | null
  contentHash: string
  createdAt: string
  resolvedAt: string | null
  updatedAt: string
}

/** Composite watermark: cases sharing an updatedAt are ordered by id. */
export interface CaseCursor {
  timestamp: string | null
  caseId: string | null
}

export const EMPTY_CURSOR: CaseCursor = { timestamp: null, caseId: null }

/**
 * One row of an incremental fetch. Rows written by external ingestion may be
 * malformed; `result` carries the validation outcome so a bad row can be
 * skipped without losing its position for cursor advancement.
 */
export interface FetchedCase {
  id: string
  updatedAt: string
  result: Result<Case, CaseKBError>
}

export interface UpsertCasesResult {
  inserted: number
  updated: number
  unchanged: number
  invalid: Array<{ id: string | null; error: string }>
}

export interface TextMatch {
  case: Case
  matchedTerms: string[]
}

export interface CaseTextFilter {
  status?: CaseStatus
  productHierarchyId?: string
}
