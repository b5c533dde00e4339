#!/usr/bin/env node

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { SupabaseClient } from '@supabase/supabase-js';
import { createSupabaseClient } from '../database/client.js';
import { loadConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Split a SQL script into statements on top-level semicolons.
 * Semicolons inside dollar-quoted bodies, string literals and `--` comments
 * do not end a statement; statements that are only comments are dropped.
 */
export function splitSqlStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let dollarTag: string | null = null;
  let inString = false;
  let inComment = false;

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];

    if (inComment) {
      current += char;
      if (char === '\n') inComment = false;
      continue;
    }

    if (dollarTag) {
      if (sql.startsWith(dollarTag, i)) {
        current += dollarTag;
        i += dollarTag.length - 1;
        dollarTag = null;
      } else {
        current += char;
      }
      continue;
    }

    if (inString) {
      current += char;
      if (char === "'") inString = false;
      continue;
    }

    if (char === '-' && sql[i + 1] === '-') {
      inComment = true;
      current += char;
      continue;
    }

    if (char === "'") {
      inString = true;
      current += char;
      continue;
    }

    if (char === '$') {
      const tag = /^\$[A-Za-z_]*\$/.exec(sql.slice(i));
      if (tag) {
        dollarTag = tag[0];
        current += dollarTag;
        i += dollarTag.length - 1;
        continue;
      }
    }

    if (char === ';') {
      statements.push(current);
      current = '';
      continue;
    }

    current += char;
  }

  statements.push(current);

  return statements
    .map(statement => statement.trim())
    .filter(statement => stripComments(statement).length > 0);
}

function stripComments(statement: string): string {
  return statement
    .split('\n')
    .filter(line => !line.trim().startsWith('--'))
    .join('\n')
    .trim();
}

/**
 * Run database migrations
 */
async function runMigrations(client: SupabaseClient): Promise<void> {
  logger.info('Running database migrations');

  const schemaPath = join(__dirname, '../database/schema.sql');
  const statements = splitSqlStatements(readFileSync(schemaPath, 'utf-8'));

  logger.info(`Executing ${statements.length} SQL statements`);

  let failed = 0;
  for (let i = 0; i < statements.length; i++) {
    const statement = statements[i];
    const { error } = await client.rpc('exec_sql', { sql: statement });

    if (error) {
      failed++;
      logger.warn(`Statement ${i + 1} failed`, {
        error: error.message,
        statement: statement.substring(0, 100),
      });
    } else {
      logger.debug(`Statement ${i + 1} executed successfully`);
    }
  }

  // Verify tables exist
  for (const table of ['listings', 'price_history', 'scraping_metadata']) {
    const { error } = await client.from(table).select('id').limit(1);
    if (error) {
      throw new Error(`Table verification failed for ${table}: ${error.message}`);
    }
  }

  logger.info('Database tables verified', { statements: statements.length, failed });
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runMigrations(createSupabaseClient(loadConfig()))
    .then(() => {
      logger.info('Migrations completed successfully');
      process.exit(0);
    })
    .catch(error => {
      logger.error('Migrations failed', { error: errorMessage(error) });
      logger.info('Manual migration: paste src/database/schema.sql into the Supabase SQL editor and run it');
      process.exit(1);
    });
}

export { runMigrations };
