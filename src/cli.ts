#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { Client } from './client.js';
import { loadConfig } from './config.js';
import { SDKError } from './errors.js';
import { exportProjectSessions } from './export/sessionExporter.js';
import type { SearchResult, SessionSummary } from './types/index.js';
import { truncate } from './utils/text.js';

dotenv.config();

interface GlobalOptions {
  baseUrl?: string;
  timeout?: string;
  cache: boolean;
}

const program = new Command();
program
  .name('specstory')
  .description('Browse, search and export SpecStory sessions from the command line.')
  .option('--base-url <url>', 'API base URL (default SPECSTORY_BASE_URL or the hosted service).')
  .option('--timeout <ms>', 'Request timeout in milliseconds.')
  .option('--no-cache', 'Disable the in-memory response cache.');

program
  .command('projects')
  .description('List projects.')
  .action(async () => {
    await withClient('projects', async (client) => {
      const projects = await client.projects.list();
      for (const project of projects) {
        console.log(`${project.id}\t${project.name}`);
      }
      console.log(`${projects.length} projects.`);
    });
  });

program
  .command('sessions <projectId>')
  .description('List every session of a project.')
  .option('--page-size <number>', 'Sessions per page request.')
  .action(async (projectId: string, rawOptions: { pageSize?: string }) => {
    const pageSize = parsePositiveInteger(rawOptions.pageSize, undefined, 'page-size');
    await withClient('sessions', async (client) => {
      let count = 0;
      for await (const session of client.sessions.listPaginated(projectId, { pageSize })) {
        console.log(formatSummary(session));
        count += 1;
      }
      console.log(`${count} sessions.`);
    });
  });

program
  .command('read <projectId> <sessionId>')
  .description('Print the markdown of one session.')
  .action(async (projectId: string, sessionId: string) => {
    await withClient('read', async (client) => {
      const session = await client.sessions.read(projectId, sessionId);
      if (session) {
        console.log(session.markdown);
      }
    });
  });

program
  .command('recent')
  .description('List the most recently updated sessions.')
  .option('--limit <number>', 'Number of sessions (default 10).')
  .action(async (rawOptions: { limit?: string }) => {
    const limit = parsePositiveInteger(rawOptions.limit, undefined, 'limit');
    await withClient('recent', async (client) => {
      const sessions = await client.sessions.recent({ limit });
      for (const session of sessions) {
        console.log(formatSummary(session));
      }
    });
  });

program
  .command('search <query>')
  .description('Full-text search across sessions.')
  .option('--limit <number>', 'Maximum number of results (default 200).')
  .option('--project <ids...>', 'Restrict the search to these project ids.')
  .action(async (query: string, rawOptions: { limit?: string; project?: string[] }) => {
    const limit = parsePositiveInteger(rawOptions.limit, undefined, 'limit');
    const filters = rawOptions.project && rawOptions.project.length > 0 ? { projectIds: rawOptions.project } : undefined;
    await withClient('search', async (client) => {
      const results = await client.graphql.search(query, { limit, filters });
      for (const result of results.results) {
        console.log(formatSearchResult(result));
      }
      console.log(`${results.results.length} of ${results.total} matches.`);
    });
  });

program
  .command('export <projectId>')
  .description('Write every session of a project to markdown files.')
  .option('--out <dir>', 'Output directory.', 'exports')
  .option('--concurrency <number>', 'Concurrent session reads (default 4).')
  .action(async (projectId: string, rawOptions: { out: string; concurrency?: string }) => {
    const concurrency = parsePositiveInteger(rawOptions.concurrency, 4, 'concurrency');
    const outDir = path.resolve(rawOptions.out);
    await withClient('export', async (client) => {
      const files = await exportProjectSessions(client, projectId, {
        outDir,
        concurrency,
        logger: createLogger('export'),
      });
      console.log(`Wrote ${files.length} sessions to ${outDir}`);
    });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof SDKError ? error.toString() : error);
  process.exitCode = 1;
});

async function withClient(scope: string, run: (client: Client) => Promise<void>): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  const config = loadConfig();
  const timeoutMs = parsePositiveInteger(globals.timeout, config.timeoutMs, 'timeout');
  const client = new Client({
    ...config,
    baseUrl: globals.baseUrl ?? config.baseUrl,
    timeoutMs,
    cache: globals.cache ? config.cache : false,
    logger: createLogger(scope),
  });
  try {
    await run(client);
  } finally {
    client.close();
  }
}

function createLogger(scope: string) {
  return (message: string) => console.log(`[${scope}] ${message}`);
}

function formatSummary(session: SessionSummary): string {
  return `${session.id}\t${session.updatedAt}\t${truncate(session.name, 80)}`;
}

function formatSearchResult(result: SearchResult): string {
  const rank = result.rank === undefined ? '' : ` (${result.rank.toFixed(3)})`;
  return `${result.projectId}/${result.id}\t${truncate(result.name, 80)}${rank}`;
}

function parsePositiveInteger(value: string | undefined, fallback: number | undefined, flagName: string): number | undefined {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}
