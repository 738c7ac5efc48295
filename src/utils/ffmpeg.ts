import ffmpeg from 'fluent-ffmpeg';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';

const bundledPath = typeof ffmpegInstaller.path === 'string' ? ffmpegInstaller.path : '';

if (bundledPath.length > 0) {
  ffmpeg.setFfmpegPath(bundledPath);
}

/** Bundled binary first, then whatever `ffmpeg` resolves to on PATH. */
export const FFMPEG_CANDIDATES: readonly string[] = Array.from(
  new Set([bundledPath, 'ffmpeg'].filter(candidate => candidate.length > 0))
);

export function resolveFfmpegBinary(): string {
  return FFMPEG_CANDIDATES[0] ?? 'ffmpeg';
}

export { ffmpeg };
