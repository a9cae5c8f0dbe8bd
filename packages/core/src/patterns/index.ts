/**
 * Patterns: issue categories, keyword detection and case assignments.
 */

export {
  CATEGORY_IDS,
  CategoryIdSchema,
  KnowledgeCategorySchema,
  CategoryDefinitionSchema,
  CategoryTableSchema,
  CategoryTable,
  parseCategoryTable,
  loadCategoryTable,
  defaultCategoryTable,
} from './categories.js'
export type { CategoryId, KnowledgeCategory, CategoryDefinition, Category } from './categories.js'
export { PatternDetector, keywordPattern, caseDetectionText } from './detector.js'
export type { CategoryMatch } from './detector.js'
export type { CaseAssignment, CategoryCount, AssignmentPlan } from './schemas.js'
export { planAssignment } from './planner.js'
export { AssignmentRepository } from './assignment-repository.js'
export { reclassifyUncategorized } from './reclassify.js'
export type { ReclassifiedCase, ReclassifyResult } from './reclassify.js'
