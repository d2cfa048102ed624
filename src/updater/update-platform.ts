import type { UPDATE_PLATFORMS } from '../config/env.validation';

export type UpdatePlatform = (typeof UPDATE_PLATFORMS)[number];

const ARTIFACT_EXTENSIONS: Record<UpdatePlatform, string> = {
  windows: '.exe',
  linux: '.AppImage',
  macos: '.dmg',
};

export function detectPlatform(
  nodePlatform: NodeJS.Platform = process.platform,
): UpdatePlatform {
  if (nodePlatform === 'win32') return 'windows';
  if (nodePlatform === 'darwin') return 'macos';
  return 'linux';
}

export function artifactExtension(platform: UpdatePlatform): string {
  return ARTIFACT_EXTENSIONS[platform];
}
