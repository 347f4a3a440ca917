import { sql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

console.log('Running migrations...');
const applied = await runMigrations(sql);
console.log(applied.length ? `Applied: ${applied.join(', ')}` : 'Nothing to apply.');
await sql.end();
