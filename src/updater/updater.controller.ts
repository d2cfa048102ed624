import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { z } from 'zod';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { UpdaterService } from './updater.service';
import {
  DownloadStartResult,
  InstallResult,
  UpdateCheckResult,
  UpdateStatus,
} from './updater.types';

const installSchema = z
  .object({ relaunch: z.boolean().default(false) })
  .default({});

/**
 * UpdaterController
 *
 * Endpoints:
 * - GET /updates/status
 * - POST /updates/check
 * - POST /updates/download - starts in the background
 * - POST /updates/cancel
 * - POST /updates/install - { relaunch?: boolean }
 */
@Controller('updates')
export class UpdaterController {
  constructor(private readonly updaterService: UpdaterService) {}

  @Get('status')
  getStatus(): UpdateStatus {
    return this.updaterService.getStatus();
  }

  @Post('check')
  @HttpCode(200)
  async check(): Promise<UpdateCheckResult> {
    return this.updaterService.check();
  }

  @Post('download')
  @HttpCode(202)
  startDownload(): DownloadStartResult {
    return this.updaterService.startDownload();
  }

  @Post('cancel')
  @HttpCode(200)
  cancel(): { cancelled: boolean } {
    return { cancelled: this.updaterService.cancelDownload() };
  }

  @Post('install')
  @HttpCode(202)
  async install(
    @Body(new ZodValidationPipe(installSchema))
    body: z.infer<typeof installSchema>,
  ): Promise<InstallResult> {
    return this.updaterService.install(body);
  }
}
