/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const UUIDSchema = z.string().uuid()

export const TimestampSchema = z.string().datetime({ offset: true })

export const FilePathSchema = z.string().min(1, 'File path cannot be empty')

/** Identifier of an externally owned record (case numbers are not UUIDs). */
export const ExternalIdSchema = z.string().trim().min(1, 'Identifier cannot be empty')
