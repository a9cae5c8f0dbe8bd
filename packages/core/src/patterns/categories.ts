/**
 * Issue categories: ids, keyword sets and article templates.
 * The table is loaded once, validated and frozen. Declaration order is the
 * tie-break priority for the detector.
 */

import { existsSync, readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { Ok, Err, errorMessage, stableHash } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'

export const CATEGORY_IDS = [
  'processor_errors',
  'network_issues',
  'raid_controller_issues',
  'hard_drive_failures',
  'bios_firmware_issues',
  'boot_failures',
  'memory_issues',
  'power_supply_issues',
  'thermal_issues',
] as const

export const CategoryIdSchema = z.enum(CATEGORY_IDS)
export type CategoryId = z.infer<typeof CategoryIdSchema>

export const KnowledgeCategorySchema = z.enum(['Hardware', 'Networking', 'Storage', 'Firmware', 'Environmental'])
export type KnowledgeCategory = z.infer<typeof KnowledgeCategorySchema>

export const CategoryDefinitionSchema = z.object({
  id: CategoryIdSchema,
  label: z.string().min(1),
  title: z.string().min(1),
  /** `{products}` and `{count}` are substituted at generation time. */
  summary: z.string().min(1),
  knowledgeCategory: KnowledgeCategorySchema,
  keywords: z.array(z.string().trim().toLowerCase().min(1)).min(1),
})

export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>

export interface Category {
  readonly id: CategoryId
  readonly label: string
  readonly title: string
  readonly summary: string
  readonly knowledgeCategory: KnowledgeCategory
  readonly keywords: readonly string[]
}

export const CategoryTableSchema = z
  .object({ categories: z.array(CategoryDefinitionSchema).min(1) })
  .refine((t) => new Set(t.categories.map((c) => c.id)).size === t.categories.length, {
    message: 'Category ids must be unique',
    path: ['categories'],
  })

export class CategoryTable {
  readonly categories: readonly Category[]
  /** sha-256 of the table's sorted-key JSON. */
  readonly fingerprint: string
  private readonly byId: ReadonlyMap<CategoryId, Category>

  constructor(categories: readonly CategoryDefinition[]) {
    this.categories = Object.freeze(
      categories.map((c): Category => Object.freeze({ ...c, keywords: Object.freeze([...new Set(c.keywords)]) })),
    )
    this.fingerprint = stableHash(this.categories)
    this.byId = new Map(this.categories.map((c) => [c.id, c]))
  }

  get(id: CategoryId): Category | undefined {
    return this.byId.get(id)
  }

  has(id: CategoryId): boolean {
    return this.byId.has(id)
  }

  get ids(): CategoryId[] {
    return this.categories.map((c) => c.id)
  }
}

export function parseCategoryTable(raw: unknown): Result<CategoryTable, CaseKBError> {
  const parsed = CategoryTableSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    return Err(CaseKBError.config(`Invalid category table: ${details}`))
  }
  return Ok(new CategoryTable(parsed.data.categories))
}

const DEFAULT_TABLE_PATH = fileURLToPath(new URL('./default-categories.json', import.meta.url))

/** Load a category table from JSON. Without a path the bundled table is used. */
export function loadCategoryTable(path: string = DEFAULT_TABLE_PATH): Result<CategoryTable, CaseKBError> {
  if (!existsSync(path)) return Err(CaseKBError.config(`Category table not found: ${path}`))
  try {
    return parseCategoryTable(JSON.parse(readFileSync(path, 'utf-8')))
  } catch (err) {
    return Err(CaseKBError.config(`Failed to read category table ${path}: ${errorMessage(err)}`))
  }
}

let defaultTable: CategoryTable | null = null

export function defaultCategoryTable(): CategoryTable {
  if (!defaultTable) {
    const loaded = loadCategoryTable()
    if (!loaded.ok) throw loaded.error
    defaultTable = loaded.value
  }
  return defaultTable
}
