// engine/reportRetention.ts
// Which stored reports are past their download window.

export interface StoredBlob {
  url: string;
  pathname: string;
  uploadedAt: Date;
}

export interface RetentionSelection {
  expired: StoredBlob[];
  kept: StoredBlob[];
}

/**
 * Split blobs into expired and kept. Blobs without a usable timestamp are
 * never treated as expired.
 */
export function selectExpiredReports(
  blobs: StoredBlob[],
  now: number,
  retentionMs: number
): RetentionSelection {
  const expired: StoredBlob[] = [];
  const kept: StoredBlob[] = [];

  for (const blob of blobs) {
    const uploadedAt = blob.uploadedAt.getTime();
    if (Number.isFinite(uploadedAt) && now - uploadedAt > retentionMs) expired.push(blob);
    else kept.push(blob);
  }

  return { expired, kept };
}
