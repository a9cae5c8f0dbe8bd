import { Ok } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { CaseKBError } from '../common/index.js'
import type { Case, CaseRepository } from '../cases/index.js'
import type { AssignmentRepository } from './assignment-repository.js'
import type { CategoryId } from './categories.js'
import type { PatternDetector } from './detector.js'
import { planAssignment } from './planner.js'
import type { CaseAssignment } from './schemas.js'

export interface ReclassifiedCase {
  case: Case
  category: CategoryId
}

export interface ReclassifyResult {
  examined: number
  categorized: number
  /** Cases that left the uncategorized pool, with their new category. */
  recategorized: ReclassifiedCase[]
}

/**
 * Re-run detection for uncategorized cases whose stored fingerprint differs
 * from the detector's table. Newly categorized cases join the unprocessed pool.
 */
export function reclassifyUncategorized(
  cases: CaseRepository,
  assignments: AssignmentRepository,
  detector: PatternDetector,
  now: string = new Date().toISOString(),
): Result<ReclassifyResult, CaseKBError> {
  const ids = assignments.listUncategorizedOutdated(detector.fingerprint)
  if (!ids.ok) return ids
  if (ids.value.length === 0) return Ok({ examined: 0, categorized: 0, recategorized: [] })

  const loaded = cases.listByIds(ids.value)
  if (!loaded.ok) return loaded

  const updates: CaseAssignment[] = []
  const recategorized: ReclassifiedCase[] = []
  for (const c of loaded.value) {
    const prior = assignments.get(c.id)
    if (!prior.ok) return prior
    const plan = planAssignment(c, detector.detect(c), prior.value, detector.fingerprint, now)
    updates.push(plan.assignment)
    if (plan.assignment.category !== null) recategorized.push({ case: c, category: plan.assignment.category })
  }
  const categorized = recategorized.length

  const saved = assignments.saveMany(updates)
  if (!saved.ok) return saved

  if (categorized > 0) {
    console.log(`[patterns] Reclassified ${categorized} of ${loaded.value.length} uncategorized cases`)
  }
  return Ok({ examined: loaded.value.length, categorized, recategorized })
}
