/**
 * Image downloads with retry and bounded concurrency
 */

import type { ImageReference } from '../lib/wikitext/types.js';
import type { FailureRecord } from './types.js';
import type { VaultWriter } from './writer.js';
import { DownloadError, WriteError, describeError } from '../lib/errors.js';
import {
  DEFAULT_DOWNLOAD_CONCURRENCY,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from '../lib/constants.js';

export interface DownloadOptions {
  /** URL file names are appended to */
  baseUrl: string;
  writer: VaultWriter;
  /** Attempts per image, the first included */
  maxRetries?: number;
  /** Initial retry delay in ms (doubles each retry) */
  retryDelayMs?: number;
  timeoutMs?: number;
  concurrency?: number;
  signal?: AbortSignal;
  /** Called after each image, successful or not */
  onProgress?: (done: number, total: number) => void;
}

export interface DownloadResult {
  downloaded: number;
  failures: FailureRecord[];
}

/**
 * URL of an image under the base URL
 *
 * @example
 * imageUrl('https://example.org/files', 'Bag_End.png')
 * // 'https://example.org/files/Bag_End.png'
 */
export function imageUrl(baseUrl: string, filename: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(encodeURIComponent(filename), base).toString();
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function attemptDownload(url: string, timeoutMs: number, signal?: AbortSignal): Promise<Uint8Array> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new DownloadError(`HTTP ${response.status} ${response.statusText}`.trim(), url, response.status);
    }
    return new Uint8Array(await response.arrayBuffer());
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Download one image into the vault.
 * Client errors (4xx other than 429) are not retried.
 *
 * @throws {DownloadError} After the last attempt
 */
export async function downloadImage(image: ImageReference, options: DownloadOptions): Promise<void> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    signal,
  } = options;
  const url = imageUrl(options.baseUrl, image.filename);

  let lastError: DownloadError | null = null;
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const bytes = await attemptDownload(url, timeoutMs, signal);
      await options.writer.write(image.path, bytes);
      return;
    } catch (error) {
      // Write failures are not retried
      if (error instanceof WriteError) throw error;
      if (signal?.aborted) throw new DownloadError('Download aborted', url, undefined, { cause: error });
      lastError = error instanceof DownloadError
        ? error
        : new DownloadError(describeError(error), url, undefined, { cause: error });

      if (!lastError.retryable) break;
      if (attempt < maxRetries) {
        await sleep(retryDelayMs * Math.pow(2, attempt - 1));
      }
    }
  }

  throw lastError ?? new DownloadError('Download failed after retries', url);
}

/**
 * Download images with at most `concurrency` requests in flight.
 * Failures are collected per image; the batch always completes.
 */
export async function downloadImages(
  images: readonly ImageReference[],
  options: DownloadOptions
): Promise<DownloadResult> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_DOWNLOAD_CONCURRENCY);
  const result: DownloadResult = { downloaded: 0, failures: [] };
  let next = 0;
  let done = 0;

  const worker = async (): Promise<void> => {
    while (next < images.length && !options.signal?.aborted) {
      const image = images[next++];
      if (!image) break;
      try {
        await downloadImage(image, options);
        result.downloaded++;
      } catch (error) {
        result.failures.push({
          kind: error instanceof DownloadError ? 'download' : 'write',
          target: image.filename,
          message: describeError(error),
        });
      }
      options.onProgress?.(++done, images.length);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, images.length) }, () => worker()));
  return result;
}
