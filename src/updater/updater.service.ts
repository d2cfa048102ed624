import { chmod, open, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../config/env.validation';
import { buildInstallHelper } from './install-helper';
import { InstallHelperLauncher } from './install-helper.launcher';
import {
  AvailableRelease,
  resolveRelease,
  updateMetadataSchema,
} from './update-metadata';
import {
  artifactExtension,
  detectPlatform,
  UpdatePlatform,
} from './update-platform';
import {
  DownloadProgress,
  DownloadResult,
  DownloadStartResult,
  InstallResult,
  ProgressCallback,
  UpdateCheckResult,
  UpdateState,
  UpdateStatus,
} from './updater.types';
import { isNewer } from './version';

export const ARTIFACT_BASENAME = 'quality-system';

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * UpdaterService
 *
 * Checks a remote metadata file for a newer build, streams the artifact
 * to disk and hands installation to a detached helper script.
 *
 * State: idle → checking → up-to-date | update-available → downloading
 * → downloaded → installing. Every failure is reported as a status value
 * with a reason; nothing here throws into the caller.
 */
@Injectable()
export class UpdaterService implements OnModuleDestroy {
  private readonly logger = new Logger(UpdaterService.name);
  private readonly platform: UpdatePlatform;
  private readonly currentVersion: string;

  private state: UpdateState = 'idle';
  private message = 'No update check performed yet';
  private available: AvailableRelease | null = null;
  private progress: DownloadProgress | null = null;
  private downloadedPath: string | null = null;
  private activeDownload: AbortController | null = null;
  private pendingDownload: Promise<DownloadResult> | null = null;

  constructor(
    private readonly configService: ConfigService<Environment, true>,
    private readonly launcher: InstallHelperLauncher,
  ) {
    this.platform =
      this.configService.get('UPDATE_PLATFORM', { infer: true }) ??
      detectPlatform();
    this.currentVersion = this.configService.get('APP_VERSION', { infer: true });
  }

  onModuleDestroy(): void {
    this.cancelDownload();
  }

  getStatus(): UpdateStatus {
    return {
      state: this.state,
      platform: this.platform,
      currentVersion: this.currentVersion,
      latestVersion: this.available?.version ?? null,
      progress: this.progress ? { ...this.progress } : null,
      downloadedPath: this.downloadedPath,
      message: this.message,
    };
  }

  async check(): Promise<UpdateCheckResult> {
    if (
      this.state === 'checking' ||
      this.state === 'downloading' ||
      this.state === 'installing'
    ) {
      return this.checkResult('check-failed', {
        reason: `Cannot check for updates while ${this.state}`,
      });
    }

    const url = this.configService.get('UPDATE_URL', { infer: true });
    if (!url) {
      return this.checkFailed('No update URL configured');
    }

    const timeoutMs = this.configService.get('UPDATE_CHECK_TIMEOUT_MS', {
      infer: true,
    });
    this.state = 'checking';
    this.logger.log(`Checking ${url} for updates`);

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        return this.checkFailed(
          `Update server responded with HTTP ${response.status}`,
        );
      }
      body = await response.json();
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      return this.checkFailed(
        timedOut
          ? `Update check timed out after ${timeoutMs} ms`
          : `Update check failed: ${describeError(error)}`,
      );
    }

    const parsed = updateMetadataSchema.safeParse(body);
    if (!parsed.success) {
      return this.checkFailed('Update metadata is not a JSON object');
    }

    const release = resolveRelease(parsed.data, this.platform);
    if (!isNewer(release.version, this.currentVersion)) {
      this.available = null;
      this.downloadedPath = null;
      this.state = 'up-to-date';
      this.message = `Version ${this.currentVersion} is up to date`;
      return this.checkResult('up-to-date', {
        latestVersion: release.version || null,
      });
    }

    if (this.downloadedPath && this.available?.version === release.version) {
      // Same release already on disk
      this.state = 'downloaded';
    } else {
      this.downloadedPath = null;
      this.state = 'update-available';
    }
    this.available = release;
    this.message = `Version ${release.version} is available`;
    this.logger.log(this.message);

    return this.checkResult('update-available', {
      latestVersion: release.version,
      downloadUrl: release.url || null,
      sizeMb: release.sizeMb,
      notes: release.notes,
      releaseNotesUrl: release.releaseNotesUrl || null,
    });
  }

  /**
   * Start a download in the background and return at once. Progress is
   * visible through getStatus().
   */
  startDownload(): DownloadStartResult {
    const blocked = this.downloadBlocker();
    if (blocked) {
      return { status: 'failed', reason: blocked };
    }
    this.pendingDownload = this.download();
    return { status: 'downloading' };
  }

  /** Resolves when the background download (if any) settles. */
  async waitForDownload(): Promise<DownloadResult | null> {
    return this.pendingDownload;
  }

  /**
   * Stream the available release to `<download dir>/<artifact>.part`,
   * then rename it into place. Cancellation or failure removes the
   * partial file and returns to `update-available`.
   */
  async download(
    onProgress?: ProgressCallback,
    signal?: AbortSignal,
  ): Promise<DownloadResult> {
    const blocked = this.downloadBlocker();
    const release = this.available;
    if (blocked || !release) {
      return {
        status: 'failed',
        reason: blocked ?? 'No update is available to download',
      };
    }

    const controller = new AbortController();
    signal?.addEventListener('abort', () => controller.abort(), { once: true });
    this.activeDownload = controller;
    this.state = 'downloading';
    this.progress = { bytes: 0, total: 0 };
    this.downloadedPath = null;
    this.message = `Downloading version ${release.version}`;

    const directory = this.configService.get('UPDATE_DOWNLOAD_DIR', {
      infer: true,
    });
    const filePath = path.join(
      directory,
      `${ARTIFACT_BASENAME}-${release.version}${artifactExtension(this.platform)}`,
    );
    const partialPath = `${filePath}.part`;

    try {
      const bytes = await this.streamToFile(
        release.url,
        partialPath,
        controller.signal,
        onProgress,
      );
      await rename(partialPath, filePath);

      this.downloadedPath = filePath;
      this.state = 'downloaded';
      this.message = `Version ${release.version} downloaded`;
      this.logger.log(`Downloaded ${bytes} bytes to ${filePath}`);
      return { status: 'downloaded', filePath, bytes };
    } catch (error) {
      await rm(partialPath, { force: true }).catch((cleanupError: unknown) =>
        this.logger.warn(
          `Could not remove ${partialPath}: ${describeError(cleanupError)}`,
        ),
      );

      const cancelled = controller.signal.aborted;
      const reason = cancelled
        ? 'Download cancelled'
        : `Download failed: ${describeError(error)}`;
      this.state = 'update-available';
      this.progress = null;
      this.message = reason;
      if (cancelled) {
        this.logger.log(reason);
      } else {
        this.logger.warn(reason);
      }
      return { status: cancelled ? 'cancelled' : 'failed', reason };
    } finally {
      this.activeDownload = null;
    }
  }

  /** Returns false when nothing was downloading. */
  cancelDownload(): boolean {
    if (!this.activeDownload) return false;
    this.activeDownload.abort();
    return true;
  }

  /**
   * Write and launch the install helper, then ask the process to exit.
   * Failures before the helper starts leave the running instance and
   * the `downloaded` state untouched.
   */
  async install(options: { relaunch?: boolean } = {}): Promise<InstallResult> {
    const artifact = this.downloadedPath;
    if (this.state !== 'downloaded' || !artifact) {
      return { status: 'failed', reason: 'No downloaded update to install' };
    }

    try {
      if (this.platform !== 'windows') {
        await chmod(artifact, 0o755);
      }
      const script = buildInstallHelper(this.platform, {
        parentPid: process.pid,
        sourcePath: artifact,
        targetPath: this.configService.get('UPDATE_INSTALL_TARGET', {
          infer: true,
        }),
        relaunch: options.relaunch ?? false,
      });
      const helperPath = path.join(
        path.dirname(artifact),
        `${ARTIFACT_BASENAME}-install-helper${script.extension}`,
      );
      await writeFile(helperPath, script.content, { mode: 0o755 });
      await this.launcher.launch(helperPath, this.platform);

      this.state = 'installing';
      this.message = `Installing version ${this.available?.version ?? 'unknown'}`;
      this.logger.log(`${this.message} via ${helperPath}`);
      this.launcher.requestExit();
      return { status: 'installing', helperPath };
    } catch (error) {
      const reason = `Install failed: ${describeError(error)}`;
      this.message = reason;
      this.logger.error(reason);
      return { status: 'failed', reason };
    }
  }

  private downloadBlocker(): string | null {
    if (this.state === 'downloading') {
      return 'A download is already in progress';
    }
    if (
      !this.available ||
      (this.state !== 'update-available' && this.state !== 'downloaded')
    ) {
      return 'No update is available to download';
    }
    if (!this.available.url) {
      return `No download URL published for ${this.platform}`;
    }
    return null;
  }

  private async streamToFile(
    url: string,
    destination: string,
    signal: AbortSignal,
    onProgress?: ProgressCallback,
  ): Promise<number> {
    const response = await fetch(url, { signal });
    if (!response.ok || !response.body) {
      throw new Error(`Download server responded with HTTP ${response.status}`);
    }

    const total = Number(response.headers.get('content-length')) || 0;
    const reader = response.body.getReader();
    const file = await open(destination, 'w');
    let received = 0;
    let finished = false;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }
        if (signal.aborted) throw new Error('Download cancelled');

        await file.write(value);
        received += value.byteLength;
        this.progress = { bytes: received, total };
        onProgress?.(received, total);
      }
      if (signal.aborted) throw new Error('Download cancelled');
    } finally {
      if (!finished) {
        await reader.cancel().catch((cancelError: unknown) =>
          this.logger.debug(
            `Could not cancel download stream: ${describeError(cancelError)}`,
          ),
        );
      }
      await file.close();
    }
    return received;
  }

  private checkFailed(reason: string): UpdateCheckResult {
    if (this.downloadedPath && this.available) {
      // The artifact on disk is still installable
      this.state = 'downloaded';
    } else {
      this.state = 'idle';
      this.available = null;
    }
    this.message = reason;
    this.logger.warn(reason);
    return this.checkResult('check-failed', { reason });
  }

  private checkResult(
    status: UpdateCheckResult['status'],
    details: Partial<Omit<UpdateCheckResult, 'status' | 'currentVersion'>>,
  ): UpdateCheckResult {
    return {
      status,
      currentVersion: this.currentVersion,
      latestVersion: null,
      downloadUrl: null,
      sizeMb: null,
      notes: null,
      releaseNotesUrl: null,
      ...details,
    };
  }
}
