import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import type { Db } from './index.ts'

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return []
  return fs
    .readdirSync(dir)
    .filter((f) => f.toLowerCase().endsWith('.sql'))
    .sort((a, b) => a.localeCompare(b))
    .map((f) => path.join(dir, f))
}

/** Applies every `migrations/*.sql` file not yet recorded, each in its own transaction. */
export function runMigrations(db: Db, dir = fileURLToPath(new URL('./migrations', import.meta.url))): string[] {
  db.exec('CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, applied_at INTEGER NOT NULL)')

  const rows = db.prepare<[], { id: string }>('SELECT id FROM schema_migrations').all()
  const applied = new Set(rows.map((r) => r.id))
  const ran: string[] = []

  for (const filePath of listMigrationFiles(dir)) {
    const id = path.basename(filePath)
    if (applied.has(id)) continue

    const sql = fs.readFileSync(filePath, 'utf8')
    db.transaction(() => {
      db.exec(sql)
      db.prepare('INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)').run(id, Date.now())
    })()
    ran.push(id)
  }

  return ran
}
