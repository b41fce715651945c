import { readFileSync } from 'fs';
import path from 'path';
import { createDatabase } from '../src/config/database';

/**
 * Applies db/schema.sql; every statement is idempotent
 */
async function main() {
  const db = createDatabase();
  const schema = readFileSync(path.resolve(__dirname, '../db/schema.sql'), 'utf8');

  console.log('🗄️  Applying schema...');
  try {
    await db.raw(schema);
    console.log('✅ Schema applied');
  } finally {
    await db.destroy();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Migration failed:', error);
  process.exit(1);
});
