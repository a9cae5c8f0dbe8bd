/**
 * Cases: the externally owned records categorization and search read from.
 */

export { CaseStatusSchema, CaseInputSchema, EMPTY_CURSOR } from './schemas.js'
export type {
  Case,
  CaseStatus,
  CaseInput,
  CaseCursor,
  FetchedCase,
  UpsertCasesResult,
  TextMatch,
  CaseTextFilter,
} from './schemas.js'
export { CaseRepository, caseContentHash } from './repository.js'
export type { UpsertedCase } from './repository.js'
