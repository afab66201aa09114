import { createWriteStream } from "node:fs";
import { mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import { DownloadError, formatError } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import type { DownloadOptions, DownloadResult } from "./types.js";

const log = createLogger("installer:download");

/** Time allowed for the server to start answering, and between body chunks. */
export const DEFAULT_RESPONSE_TIMEOUT_MS = 30_000;

/**
 * Stream `url` into `destPath` chunk by chunk, reporting progress as bytes
 * arrive. A partial file is removed when the transfer fails.
 *
 * @throws DownloadError on network failure, timeout, non-ok status or abort.
 */
export async function downloadToFile(
  url: string,
  destPath: string,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const { onProgress, signal } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
  log.info(`Downloading ${url}`);

  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) controller.abort(signal.reason);
  signal?.addEventListener("abort", onAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new Error(`no response within ${timeoutMs} ms`)),
    timeoutMs,
  );

  try {
    let response: Response;
    try {
      response = await fetch(url, { signal: controller.signal, redirect: "follow" });
    } catch (err) {
      const reason = controller.signal.aborted ? controller.signal.reason : err;
      throw new DownloadError(url, `Download failed: ${formatError(reason)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new DownloadError(url, `Download failed: HTTP ${response.status} ${response.statusText}`, {
        statusCode: response.status,
      });
    }

    if (!response.body) {
      throw new DownloadError(url, "Download failed: no response body");
    }

    const lengthHeader = Number(response.headers.get("content-length"));
    const total = Number.isFinite(lengthHeader) && lengthHeader > 0 ? lengthHeader : null;
    let downloaded = 0;

    const reader = response.body.getReader();
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = (): void => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        const stalled = new Error(`no data received for ${timeoutMs} ms`);
        controller.abort(stalled);
        nodeStream.destroy(stalled);
        reader.cancel(stalled).catch((cancelErr: unknown) => {
          log.debug(`Could not cancel stalled body of ${url}: ${formatError(cancelErr)}`);
        });
      }, timeoutMs);
    };

    const nodeStream = new Readable({
      async read() {
        armIdleTimer();
        try {
          const { done, value } = await reader.read();
          clearTimeout(idleTimer);
          if (this.destroyed) return;
          if (done) {
            this.push(null);
            return;
          }
          downloaded += value.byteLength;
          onProgress?.({
            downloaded,
            total,
            percent: total === null ? null : Math.min(100, Math.round((downloaded / total) * 100)),
          });
          this.push(Buffer.from(value));
        } catch (err) {
          clearTimeout(idleTimer);
          this.destroy(err instanceof Error ? err : new Error(String(err)));
        }
      },
    });

    await mkdir(dirname(destPath), { recursive: true });
    const writeStream = createWriteStream(destPath);

    try {
      await pipeline(nodeStream, writeStream);
    } catch (err) {
      clearTimeout(idleTimer);
      await unlink(destPath).catch((unlinkErr: unknown) => {
        log.debug(`Could not remove partial download ${destPath}: ${formatError(unlinkErr)}`);
      });
      throw new DownloadError(url, `Download interrupted: ${formatError(err)}`, { cause: err });
    }

    log.info(`Download complete: ${downloaded} bytes`);
    return { filePath: destPath, bytes: downloaded };
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
}
