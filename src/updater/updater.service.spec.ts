import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { chunkedResponse } from '../../test/utils/test-helpers';
import { InstallHelperLauncher } from './install-helper.launcher';
import { UpdaterService } from './updater.service';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const bytes = (...values: number[]) => new Uint8Array(values);

describe('UpdaterService', () => {
  let service: UpdaterService;
  let downloadDir: string;
  let config: Record<string, unknown>;

  const launcher = {
    launch: jest.fn(),
    requestExit: jest.fn(),
  };

  const metadata = {
    version: '1.3.0',
    download_url: 'https://updates.example.test/quality-system',
    notes: 'Control chart fixes',
    linux: {
      url: 'https://updates.example.test/quality-system.AppImage',
      size_mb: 80,
    },
  };

  async function createService(): Promise<UpdaterService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UpdaterService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
        { provide: InstallHelperLauncher, useValue: launcher },
      ],
    }).compile();
    return module.get<UpdaterService>(UpdaterService);
  }

  async function reachAvailable(): Promise<void> {
    mockFetch.mockResolvedValueOnce(jsonResponse(metadata));
    await service.check();
  }

  beforeEach(async () => {
    mockFetch.mockReset();
    launcher.launch.mockReset().mockResolvedValue(undefined);
    launcher.requestExit.mockReset();
    downloadDir = fs.mkdtempSync(path.join(os.tmpdir(), 'updater-spec-'));
    config = {
      APP_VERSION: '1.2.0',
      UPDATE_URL: 'https://updates.example.test/version.json',
      UPDATE_CHECK_TIMEOUT_MS: 5000,
      UPDATE_DOWNLOAD_DIR: downloadDir,
      UPDATE_INSTALL_TARGET: path.join(downloadDir, 'installed.AppImage'),
      UPDATE_PLATFORM: 'linux',
    };
    service = await createService();
  });

  afterEach(() => {
    fs.rmSync(downloadDir, { recursive: true, force: true });
  });

  describe('check', () => {
    it('should report a newer version with the platform URL', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(metadata));

      const result = await service.check();

      expect(result).toEqual({
        status: 'update-available',
        currentVersion: '1.2.0',
        latestVersion: '1.3.0',
        downloadUrl: 'https://updates.example.test/quality-system.AppImage',
        sizeMb: 80,
        notes: 'Control chart fixes',
        releaseNotesUrl: null,
      });
      expect(service.getStatus().state).toBe('update-available');
      expect(mockFetch).toHaveBeenCalledWith(
        'https://updates.example.test/version.json',
        expect.objectContaining({ headers: { Accept: 'application/json' } }),
      );
    });

    it('should report up-to-date for an equal version', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ version: '1.2' }));

      const result = await service.check();

      expect(result.status).toBe('up-to-date');
      expect(result.latestVersion).toBe('1.2');
      expect(service.getStatus().state).toBe('up-to-date');
    });

    it('should fail on a non-200 response', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 503));

      const result = await service.check();

      expect(result.status).toBe('check-failed');
      expect(result.reason).toBe('Update server responded with HTTP 503');
      expect(service.getStatus().state).toBe('idle');
    });

    it('should fail on a timeout', async () => {
      mockFetch.mockRejectedValueOnce(
        Object.assign(new Error('The operation was aborted'), {
          name: 'TimeoutError',
        }),
      );

      const result = await service.check();

      expect(result.reason).toBe('Update check timed out after 5000 ms');
    });

    it('should fail on a network error', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await service.check();

      expect(result.reason).toBe('Update check failed: fetch failed');
    });

    it('should fail when the body is not a JSON object', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(['1.3.0']));

      const result = await service.check();

      expect(result).toMatchObject({
        status: 'check-failed',
        reason: 'Update metadata is not a JSON object',
      });
    });

    it('should fail without an update URL', async () => {
      config.UPDATE_URL = undefined;
      service = await createService();

      const result = await service.check();

      expect(result.reason).toBe('No update URL configured');
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('download', () => {
    it('should stream to a partial file, report progress and rename', async () => {
      await reachAvailable();
      mockFetch.mockResolvedValueOnce(
        chunkedResponse([bytes(1, 2, 3), bytes(4, 5)]),
      );
      const progress: Array<[number, number]> = [];

      const result = await service.download((received, total) =>
        progress.push([received, total]),
      );

      const filePath = path.join(downloadDir, 'quality-system-1.3.0.AppImage');
      expect(result).toEqual({ status: 'downloaded', filePath, bytes: 5 });
      expect(progress).toEqual([
        [3, 5],
        [5, 5],
      ]);
      expect([...fs.readFileSync(filePath)]).toEqual([1, 2, 3, 4, 5]);
      expect(fs.existsSync(`${filePath}.part`)).toBe(false);
      expect(service.getStatus()).toMatchObject({
        state: 'downloaded',
        downloadedPath: filePath,
        progress: { bytes: 5, total: 5 },
      });
      expect(mockFetch).toHaveBeenLastCalledWith(
        'https://updates.example.test/quality-system.AppImage',
        expect.objectContaining({ signal: expect.any(AbortSignal) as AbortSignal }),
      );
    });

    it('should report a total of 0 without content-length', async () => {
      await reachAvailable();
      mockFetch.mockResolvedValueOnce(
        chunkedResponse([bytes(9)], { contentLength: null }),
      );
      const totals: number[] = [];

      await service.download((_, total) => totals.push(total));

      expect(totals).toEqual([0]);
    });

    it('should delete the partial file when cancelled', async () => {
      await reachAvailable();
      mockFetch.mockResolvedValueOnce(
        chunkedResponse([bytes(1), bytes(2), bytes(3)]),
      );

      const result = await service.download(() => service.cancelDownload());

      expect(result).toEqual({ status: 'cancelled', reason: 'Download cancelled' });
      expect(fs.readdirSync(downloadDir)).toEqual([]);
      expect(service.getStatus().state).toBe('update-available');
    });

    it('should return to update-available on HTTP errors', async () => {
      await reachAvailable();
      mockFetch.mockResolvedValueOnce(chunkedResponse([], { status: 404 }));

      const result = await service.download();

      expect(result).toEqual({
        status: 'failed',
        reason: 'Download failed: Download server responded with HTTP 404',
      });
      expect(service.getStatus().state).toBe('update-available');
    });

    it('should cancel the response stream when writing stops early', async () => {
      await reachAvailable();
      const cancel = jest.fn();
      let sent = 0;
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          sent += 1;
          controller.enqueue(bytes(sent));
        },
        cancel,
      });
      mockFetch.mockResolvedValueOnce(new Response(body, { status: 200 }));

      const result = await service.download(() => {
        throw new Error('disk full');
      });

      expect(result).toEqual({
        status: 'failed',
        reason: 'Download failed: disk full',
      });
      expect(cancel).toHaveBeenCalledTimes(1);
      expect(fs.readdirSync(downloadDir)).toEqual([]);
    });

    it('should refuse to download before a successful check', async () => {
      const result = await service.download();

      expect(result).toEqual({
        status: 'failed',
        reason: 'No update is available to download',
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should run in the background when started', async () => {
      await reachAvailable();
      mockFetch.mockResolvedValueOnce(chunkedResponse([bytes(7)]));

      expect(service.startDownload()).toEqual({ status: 'downloading' });
      expect(service.getStatus().state).toBe('downloading');
      expect(service.startDownload()).toEqual({
        status: 'failed',
        reason: 'A download is already in progress',
      });

      const result = await service.waitForDownload();
      expect(result?.status).toBe('downloaded');
    });
  });

  describe('install', () => {
    async function reachDownloaded(): Promise<string> {
      await reachAvailable();
      mockFetch.mockResolvedValueOnce(chunkedResponse([bytes(1)]));
      const result = await service.download();
      if (!result.filePath) throw new Error('download failed');
      return result.filePath;
    }

    it('should write the helper, launch it and request exit', async () => {
      const artifact = await reachDownloaded();

      const result = await service.install({ relaunch: true });

      const helperPath = path.join(downloadDir, 'quality-system-install-helper.sh');
      expect(result).toEqual({ status: 'installing', helperPath });
      expect(fs.statSync(artifact).mode & 0o777).toBe(0o755);
      const script = fs.readFileSync(helperPath, 'utf8');
      expect(script).toContain(`SOURCE='${artifact}'`);
      expect(script).toContain('nohup "$TARGET" >/dev/null 2>&1 &');
      expect(script).toContain(`PARENT_PID=${process.pid}`);
      expect(launcher.launch).toHaveBeenCalledWith(helperPath, 'linux');
      expect(launcher.requestExit).toHaveBeenCalledTimes(1);
      expect(service.getStatus().state).toBe('installing');
    });

    it('should stay downloaded when the helper cannot start', async () => {
      await reachDownloaded();
      launcher.launch.mockRejectedValueOnce(new Error('spawn /bin/sh ENOENT'));

      const result = await service.install();

      expect(result).toEqual({
        status: 'failed',
        reason: 'Install failed: spawn /bin/sh ENOENT',
      });
      expect(service.getStatus().state).toBe('downloaded');
      expect(launcher.requestExit).not.toHaveBeenCalled();
    });

    it('should keep a finished download installable after a failed re-check', async () => {
      const artifact = await reachDownloaded();
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 503));

      const check = await service.check();

      expect(check.status).toBe('check-failed');
      expect(service.getStatus()).toMatchObject({
        state: 'downloaded',
        downloadedPath: artifact,
      });
      expect(fs.existsSync(artifact)).toBe(true);
      const result = await service.install();
      expect(result.status).toBe('installing');
    });

    it('should refuse to install without a download', async () => {
      const result = await service.install();

      expect(result).toEqual({
        status: 'failed',
        reason: 'No downloaded update to install',
      });
    });
  });
});
