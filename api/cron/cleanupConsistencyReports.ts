// api/cron/cleanupConsistencyReports.ts
// Purpose: delete stored consistency reports older than the retention window.
// Schedule: every hour (vercel.json crons)
// Supports: dry-run mode (no deletions)

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { del, list } from '@vercel/blob';

import { loadServiceConfig } from '../../engine/config';
import { describeError, logError, logInfo } from '../../engine/logger';
import { selectExpiredReports } from '../../engine/reportRetention';

function parseBool(v: unknown): boolean {
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  // Cron calls are GET by default
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const config = loadServiceConfig();
  const now = Date.now();
  const dry_run = parseBool(req.query.dry_run) || parseBool(process.env.CLEANUP_DRY_RUN);
  const prefix = config.blobPrefix;

  let scanned = 0;
  let eligible = 0;
  let deleted = 0;
  const sample_deleted: string[] = [];

  try {
    let cursor: string | undefined;

    do {
      const page = await list({ prefix, cursor, limit: 1000 });
      scanned += page.blobs.length;

      const { expired } = selectExpiredReports(page.blobs, now, config.retentionMs);
      eligible += expired.length;

      if (expired.length > 0 && !dry_run) {
        await del(expired.map((blob) => blob.url));
        deleted += expired.length;
      }
      for (const blob of expired) {
        if (sample_deleted.length < 5) sample_deleted.push(blob.pathname);
      }

      cursor = page.hasMore ? page.cursor : undefined;
    } while (cursor);

    logInfo('reports_cleanup_completed', { prefix, dry_run, scanned, eligible, deleted });

    return res.status(200).json({
      ok: true,
      dry_run,
      prefix,
      scanned,
      eligible,
      deleted,
      would_delete: dry_run ? eligible : 0,
      sample_deleted
    });
  } catch (err) {
    logError('reports_cleanup_failed', { prefix, ...describeError(err) });
    return res.status(500).json({ ok: false, error: 'Cleanup failed', dry_run, prefix });
  }
}
