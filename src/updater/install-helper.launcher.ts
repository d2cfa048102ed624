import { spawn } from 'node:child_process';
import { Injectable, Logger } from '@nestjs/common';
import { UpdatePlatform } from './update-platform';

/** Time for the HTTP response to leave before the process stops */
const EXIT_DELAY_MS = 500;

/**
 * Process-level side effects of installing an update, kept behind an
 * injectable so UpdaterService can be tested without spawning anything.
 */
@Injectable()
export class InstallHelperLauncher {
  private readonly logger = new Logger(InstallHelperLauncher.name);

  /**
   * Start the helper detached from this process. Resolves once the
   * child is running, rejects if it could not be started.
   */
  launch(helperPath: string, platform: UpdatePlatform): Promise<void> {
    const [command, args]: [string, string[]] =
      platform === 'windows'
        ? ['cmd.exe', ['/d', '/c', helperPath]]
        : ['/bin/sh', [helperPath]];

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        detached: true,
        stdio: 'ignore',
        windowsHide: true,
      });
      child.once('error', reject);
      child.once('spawn', () => {
        this.logger.log(`Install helper started (pid ${child.pid ?? '?'})`);
        child.unref();
        resolve();
      });
    });
  }

  /**
   * Ask the application to shut down. SIGTERM goes through Nest's
   * shutdown hooks so the database is closed before the helper copies.
   */
  requestExit(delayMs: number = EXIT_DELAY_MS): void {
    this.logger.warn(`Exiting in ${delayMs} ms to complete the update`);
    setTimeout(() => process.kill(process.pid, 'SIGTERM'), delayMs);
  }
}
