import { promises as fs } from 'node:fs';
import path from 'node:path';
import pLimit from 'p-limit';
import type { Client } from '../client.js';
import type { SessionSummary } from '../types/index.js';
import { slugify } from '../utils/text.js';

export interface ExportOptions {
  outDir: string;
  concurrency?: number | undefined;
  logger?: ((message: string) => void) | undefined;
}

const DEFAULT_EXPORT_CONCURRENCY = 4;

/**
 * Writes every session of a project as `<slug>-<id>.md` under `outDir` and returns the
 * written paths in listing order. The id is percent-encoded so it cannot leave `outDir`.
 */
export async function exportProjectSessions(
  client: Client,
  projectId: string,
  options: ExportOptions,
): Promise<string[]> {
  const concurrency = options.concurrency ?? DEFAULT_EXPORT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer (received ${concurrency})`);
  }

  const summaries: SessionSummary[] = [];
  for await (const summary of client.sessions.listPaginated(projectId)) {
    summaries.push(summary);
  }
  options.logger?.(`Exporting ${summaries.length} sessions from project ${projectId}`);

  await fs.mkdir(options.outDir, { recursive: true });
  const limit = pLimit(concurrency);

  const written = await Promise.all(
    summaries.map((summary) =>
      limit(async () => {
        const session = await client.sessions.read(projectId, summary.id);
        if (!session) {
          options.logger?.(`Session ${summary.id} returned no content, skipping`);
          return null;
        }
        const destination = path.join(options.outDir, `${slugify(session.name)}-${encodeURIComponent(session.id)}.md`);
        await fs.writeFile(destination, session.markdown, 'utf8');
        options.logger?.(`Wrote ${destination}`);
        return destination;
      }),
    ),
  );

  return written.filter((file): file is string => file !== null);
}
