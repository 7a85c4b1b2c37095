/**
 * Artifact downloader
 *
 * Fetches a pre-signed URL with a plain GET and writes it to disk through a
 * temporary sibling file, so the destination only ever appears complete.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { DownloadError, getConfig, getErrorMessage, logger } from '@flexreport/shared';
import { createTimeoutSignal, redactUrl, type TimeoutSignal, toTransportError } from '../base/http-client.js';

export interface DownloadedArtifact {
  path: string;
  bytes: number;
}

export interface ArtifactDownloaderConfig {
  timeoutMs: number;
}

export class ArtifactDownloader {
  private readonly timeoutMs: number;
  private readonly log = logger.child({ component: 'artifact-downloader' });

  constructor(config?: Partial<ArtifactDownloaderConfig>) {
    this.timeoutMs = config?.timeoutMs ?? getConfig().api.downloadTimeoutMs;
  }

  async fetchArtifact(url: string, destination: string): Promise<DownloadedArtifact> {
    const directory = path.dirname(destination);
    const tempPath = path.join(directory, `.${path.basename(destination)}.${randomUUID()}.part`);
    const timeout = createTimeoutSignal(undefined, this.timeoutMs);

    try {
      const response = await this.get(url, timeout);

      if (!response.ok) {
        await response.body?.cancel();
        throw new DownloadError(`Download failed with HTTP ${response.status} ${response.statusText}`.trim(), {
          status: response.status,
        });
      }

      const content = new Uint8Array(await response.arrayBuffer());

      await mkdir(directory, { recursive: true });
      await writeFile(tempPath, content);
      await rename(tempPath, destination);

      this.log.debug('Artifact saved', { url: redactUrl(url), destination, bytes: content.byteLength });
      return { path: destination, bytes: content.byteLength };
    } catch (error) {
      await rm(tempPath, { force: true });
      if (error instanceof DownloadError) {
        throw error;
      }
      throw new DownloadError(`Download failed: ${getErrorMessage(toTransportError(error, timeout, this.timeoutMs))}`, {
        cause: error,
      });
    } finally {
      timeout.cleanup();
    }
  }

  private async get(url: string, timeout: TimeoutSignal): Promise<Response> {
    try {
      return await fetch(url, { signal: timeout.signal });
    } catch (error) {
      throw new DownloadError(`Download request failed: ${toTransportError(error, timeout, this.timeoutMs).message}`, {
        cause: error,
      });
    }
  }
}
