// ──────────────────────────────────────────
// Knex configuration (CLI migrations)
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import path from 'path';
import { Knex } from 'knex';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const config: Knex.Config = {
  client: 'pg',
  connection: process.env.DATABASE_URL,
  migrations: {
    directory: path.resolve(__dirname, 'migrations'),
    loadExtensions: [path.extname(__filename)],
  },
};

export default config;
