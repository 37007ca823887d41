// engine/reportSink.ts
// Output storage for finished reports, injected per request.

import { rename, mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { put } from '@vercel/blob';

export interface StoredReport {
  filename: string;
  /** Public URL (blob) or absolute file path (directory). */
  location: string;
}

export interface ReportSink {
  save(filename: string, bytes: Buffer, contentType: string): Promise<StoredReport>;
}

/**
 * Vercel Blob storage under a fixed prefix. The filename already carries a
 * uniqueness token, so no random suffix is added.
 */
export function createBlobReportSink(prefix: string): ReportSink {
  return {
    async save(filename, bytes, contentType) {
      const blob = await put(`${prefix}${filename}`, bytes, {
        access: 'public',
        contentType,
        addRandomSuffix: false
      });
      return { filename, location: blob.url };
    }
  };
}

/**
 * Local directory storage. Written under a temporary name first so a report
 * only appears under its final name once complete.
 */
export function createDirectoryReportSink(dir: string): ReportSink {
  return {
    async save(filename, bytes) {
      const root = path.resolve(dir);
      const target = path.resolve(root, filename);
      if (path.dirname(target) !== root) {
        throw new Error(`Refusing to write report outside ${root}: ${filename}`);
      }
      await mkdir(root, { recursive: true });
      const partial = `${target}.partial`;
      try {
        await writeFile(partial, bytes);
        await rename(partial, target);
      } catch (err) {
        await rm(partial, { force: true });
        throw err;
      }
      return { filename, location: target };
    }
  };
}
