#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import type Database from 'better-sqlite3';
import { loadConfig, parsePort, writeDefaultConfig, type Config } from '../shared/config.js';
import { getArchiveDir, generateHash, resolvePath } from '../shared/utils.js';
import { ArchiveError } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { pendingMigrations, runMigrations } from '../db/migrate.js';
import {
  articleExists,
  createArticle,
  deleteArticle,
  getArticle,
  getArticleAuthors,
  getTotalArticles,
  listArticleSummaries,
} from '../media/articleDb.js';
import { addAuthor, getAuthor } from '../media/authorDb.js';
import { fetchAvailableMedia } from '../media/availableMedia.js';
import { startServer } from '../api/server.js';
import { ask, askOptional } from './prompt.js';

const program = new Command();

program
  .name('readaloud')
  .description('Archive of articles, texts and podcasts for text-to-speech')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(async () => {
    const configPath = path.join(getArchiveDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(config.db.path, { busyTimeoutMs: config.db.busy_timeout_ms });
    try {
      const { applied } = runMigrations(db);
      if (applied.length > 0) {
        log(`✓ ${resolvePath(config.db.path)} ready (${applied.length} migrations applied)`);
      } else {
        log(`✓ ${resolvePath(config.db.path)} already up to date`);
      }
    } finally {
      closeDb();
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config and database')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run readaloud init)');
      } else {
        try {
          await withDb(
            config,
            (db) => {
              results.push('DB: ok');
              const pending = pendingMigrations(db);
              if (pending.length > 0) {
                results.push(`Migrations: ${pending.length} pending (run readaloud init)`);
                return;
              }
              results.push(`Articles: ${getTotalArticles(db)}`);
              results.push(`With audio: ${fetchAvailableMedia(db).length}`);
            },
            { migrate: false },
          );
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        }
      }
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
    }

    log(results.join(' | '));
  });

// === server ===
program
  .command('server')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (opts: { port?: string }) => {
    await startServer({ port: parsePort(opts.port) });
  });

// === article ===
const articleCmd = program.command('article').description('Manage articles');

articleCmd
  .command('add')
  .description('Add an article interactively')
  .option('-a, --authors <names>', 'Comma-separated author names')
  .action(async (opts: { authors?: string }) => {
    const config = await loadConfig();
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

    try {
      const url = await ask(rl, 'Article URL: ');
      await withDb(config, async (db) => {
        if (articleExists(db, generateHash(url))) {
          log('An article with this URL is already archived.');
          process.exitCode = 1;
          return;
        }

        const title = await ask(rl, 'Title: ');
        const article = {
          url,
          title,
          date_published: await askOptional(rl, 'Publication date (YYYY-MM-DD, optional): '),
          language: await askOptional(rl, 'Language: '),
          plain_text: await askOptional(rl, 'Plain text: '),
          markdown_text: await askOptional(rl, 'Markdown text (optional): '),
          tl_dr: await askOptional(rl, 'TL;DR (optional): '),
          audio_file: await askOptional(rl, 'Audio file path (optional): '),
          markdown_file: await askOptional(rl, 'Markdown file path (optional): '),
          vtt_file: await askOptional(rl, 'VTT file path (optional): '),
        };
        const authors = (opts.authors ?? '')
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0);

        const id = createArticle(db, article, authors);
        log(`✓ Article '${title}' archived as ${id}`);
      });
    } finally {
      rl.close();
    }
  });

articleCmd
  .command('list')
  .description('List articles with their authors')
  .action(async () => {
    const config = await loadConfig();
    await withDb(config, (db) => {
      const rows = listArticleSummaries(db);
      log(`${'ID'.padEnd(8)} ${'Title'.padEnd(30)} ${'Author'.padEnd(20)} ${'Published'.padEnd(12)} URL`);
      log('-'.repeat(100));
      for (const row of rows) {
        log(
          `${row.id.padEnd(8)} ${truncate(row.title ?? '', 30).padEnd(30)} ${truncate(row.author ?? '', 20).padEnd(20)} ${(row.date_published ?? '').padEnd(12)} ${row.url}`,
        );
      }
    });
  });

articleCmd
  .command('show <id>')
  .description('Show one article')
  .action(async (id: string) => {
    const config = await loadConfig();
    await withDb(config, (db) => {
      const article = getArticle(db, id);
      if (!article) {
        log(`Article not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      log(JSON.stringify({ ...article, authors: getArticleAuthors(db, id) }, null, 2));
    });
  });

articleCmd
  .command('delete <id>')
  .description('Delete an article and its author links')
  .action(async (id: string) => {
    const config = await loadConfig();
    await withDb(config, (db) => {
      const deleted = deleteArticle(db, id);
      if (deleted === 0) {
        log(`Article not found: ${id}`);
        process.exitCode = 1;
      } else {
        log(`✓ Article ${id} deleted`);
      }
    });
  });

// === media ===
program
  .command('media')
  .description('List everything that has audio')
  .action(async () => {
    const config = await loadConfig();
    await withDb(config, (db) => {
      for (const item of fetchAvailableMedia(db)) {
        const authors = item.authors.length > 0 ? ` (${item.authors.join(', ')})` : '';
        log(`${item.type.padEnd(8)} ${item.id}  ${item.date_added}  ${item.title ?? '(untitled)'}${authors}`);
      }
    });
  });

// === author ===
const authorCmd = program.command('author').description('Manage authors');

authorCmd
  .command('add <id> <name>')
  .description('Add an author with an explicit id')
  .action(async (id: string, name: string) => {
    const config = await loadConfig();
    await withDb(config, (db) => {
      const result = addAuthor(db, { id, name });
      log(result.created ? `✓ Author ${name} added` : `Author ${name} already exists or id is taken`);
    });
  });

authorCmd
  .command('show <id>')
  .description('Show one author')
  .action(async (id: string) => {
    const config = await loadConfig();
    await withDb(config, (db) => {
      const author = getAuthor(db, id);
      if (!author) {
        log(`Author not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      log(`${author.id}  ${author.name}`);
    });
  });

async function withDb(
  config: Config,
  fn: (db: Database.Database) => void | Promise<void>,
  opts: { migrate?: boolean } = {},
): Promise<void> {
  const db = initDb(config.db.path, { busyTimeoutMs: config.db.busy_timeout_ms });
  try {
    if (opts.migrate !== false) runMigrations(db);
    await fn(db);
  } finally {
    closeDb();
  }
}

function truncate(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 1)}…` : value;
}

function errorMessage(err: unknown): string {
  if (err instanceof ArchiveError) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(errorMessage(err));
  process.exitCode = 1;
});
