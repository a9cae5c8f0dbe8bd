/**
 * Storage: SQLite database and migrations.
 */

export { openDatabase } from './database.js'
export { runMigrations, latestSchemaVersion } from './migrations.js'
