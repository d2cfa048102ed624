import { UpdatePlatform } from './update-platform';

export interface InstallHelperOptions {
  /** Process to wait for */
  parentPid: number;
  /** Downloaded artifact */
  sourcePath: string;
  /** File to replace */
  targetPath: string;
  relaunch: boolean;
  pollIntervalSeconds?: number;
}

export interface InstallHelperScript {
  extension: '.sh' | '.cmd';
  content: string;
}

/** Single-quote for POSIX sh */
export function quoteShell(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Value for `set "NAME=value"` in cmd.exe */
export function escapeCmd(value: string): string {
  if (value.includes('"')) {
    throw new Error(`Path cannot contain double quotes: ${value}`);
  }
  return value.replace(/%/g, '%%');
}

/**
 * Script that waits for the running instance to exit, copies the new
 * build over the installed one, optionally starts it, then removes the
 * artifact and itself.
 */
export function buildInstallHelper(
  platform: UpdatePlatform,
  options: InstallHelperOptions,
): InstallHelperScript {
  return platform === 'windows'
    ? { extension: '.cmd', content: buildCmdScript(options) }
    : { extension: '.sh', content: buildShScript(options) };
}

function buildShScript(options: InstallHelperOptions): string {
  const interval = options.pollIntervalSeconds ?? 1;
  const lines = [
    '#!/bin/sh',
    `PARENT_PID=${options.parentPid}`,
    `SOURCE=${quoteShell(options.sourcePath)}`,
    `TARGET=${quoteShell(options.targetPath)}`,
    '',
    'while kill -0 "$PARENT_PID" 2>/dev/null; do',
    `  sleep ${interval}`,
    'done',
    '',
    'cp -f "$SOURCE" "$TARGET" || exit 1',
    'chmod 755 "$TARGET"',
  ];
  if (options.relaunch) {
    lines.push('nohup "$TARGET" >/dev/null 2>&1 &');
  }
  lines.push('rm -f "$SOURCE"', 'rm -f "$0"', '');
  return lines.join('\n');
}

function buildCmdScript(options: InstallHelperOptions): string {
  const interval = options.pollIntervalSeconds ?? 1;
  const lines = [
    '@echo off',
    `set "PARENT_PID=${options.parentPid}"`,
    `set "SOURCE=${escapeCmd(options.sourcePath)}"`,
    `set "TARGET=${escapeCmd(options.targetPath)}"`,
    '',
    ':wait',
    'tasklist /FI "PID eq %PARENT_PID%" 2>NUL | find "%PARENT_PID%" >NUL',
    'if not errorlevel 1 (',
    `  timeout /t ${interval} /nobreak >NUL`,
    '  goto wait',
    ')',
    '',
    'copy /Y "%SOURCE%" "%TARGET%" >NUL || exit /b 1',
  ];
  if (options.relaunch) {
    lines.push('start "" "%TARGET%"');
  }
  // The last line deletes the running script; cmd tolerates that only via goto
  lines.push('del /F /Q "%SOURCE%"', '(goto) 2>NUL & del "%~f0"', '');
  return lines.join('\r\n');
}
