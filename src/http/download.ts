/**
 * HTTP downloads for third-party packaging tools.
 *
 * HTTPS only, redirects followed (GitHub release assets redirect to a CDN),
 * transient failures retried with backoff.
 */

import { DOWNLOAD_TIMEOUT, DEPSHIP_PREFIX, VERSION } from "../constants.js";
import { DownloadError } from "../errors.js";
import { log } from "../logger.js";
import { retryAsync } from "../utils/retry-with-backoff.js";

/** Contract for fetching a remote file into memory. */
export interface Downloader {
  download(url: string): Promise<Buffer>;
}

/** Wrap a promise with a timeout. */
async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Download a file with retry.
 *
 * @throws DownloadError for non-HTTPS URLs, HTTP errors, or exhausted retries.
 */
export async function downloadFile(url: string): Promise<Buffer> {
  if (!url.startsWith("https://")) {
    throw new DownloadError(`Refusing to download from non-HTTPS URL: ${url}`, url);
  }
  try {
    return await retryAsync(
      async () => {
        const response = await withTimeout(
          fetch(url, {
            headers: { "User-Agent": `${DEPSHIP_PREFIX}/${VERSION}` },
            redirect: "follow",
          }),
          DOWNLOAD_TIMEOUT,
          "Download"
        );
        if (!response.ok) {
          throw new Error(`Download failed: ${response.status} ${response.statusText}`);
        }
        return Buffer.from(await response.arrayBuffer());
      },
      3,
      1000,
      (attempt, delay, err) => {
        const message = err instanceof Error ? err.message : String(err);
        log.debug(`Download attempt ${attempt} failed (${message}), retrying in ${delay}ms`);
      }
    );
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DownloadError(`Could not download ${url}: ${message}`, url);
  }
}

/** Downloader backed by the global fetch. */
export const httpDownloader: Downloader = {
  download: downloadFile,
};
