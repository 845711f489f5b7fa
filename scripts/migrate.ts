import { sql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';

await runMigrations(sql);
await sql.end();
