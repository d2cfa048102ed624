export type UpdateState =
  | 'idle'
  | 'checking'
  | 'up-to-date'
  | 'update-available'
  | 'downloading'
  | 'downloaded'
  | 'installing';

export interface UpdateCheckResult {
  status: 'up-to-date' | 'update-available' | 'check-failed';
  currentVersion: string;
  latestVersion: string | null;
  downloadUrl: string | null;
  sizeMb: number | null;
  notes: string | null;
  releaseNotesUrl: string | null;
  reason?: string;
}

export interface DownloadProgress {
  bytes: number;
  /** 0 when the server sent no content-length */
  total: number;
}

export type ProgressCallback = (bytes: number, total: number) => void;

export interface DownloadResult {
  status: 'downloaded' | 'cancelled' | 'failed';
  filePath?: string;
  bytes?: number;
  reason?: string;
}

export interface DownloadStartResult {
  status: 'downloading' | 'failed';
  reason?: string;
}

export interface InstallResult {
  status: 'installing' | 'failed';
  helperPath?: string;
  reason?: string;
}

export interface UpdateStatus {
  state: UpdateState;
  platform: string;
  currentVersion: string;
  latestVersion: string | null;
  progress: DownloadProgress | null;
  downloadedPath: string | null;
  message: string;
}
