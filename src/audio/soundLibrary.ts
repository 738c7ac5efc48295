import fs from 'node:fs';
import path from 'node:path';
import logger from '../logger.js';

export const SUPPORTED_SOUND_EXTENSIONS = ['.mp3', '.wav', '.ogg'] as const;

export type SoundFile = {
  name: string;
  path: string;
};

type LibraryLog = Pick<typeof logger, 'info' | 'warn'>;

export type SoundLibraryOptions = {
  log?: LibraryLog;
};

/** Scans one directory for playable clips. The directory is created when missing. */
export class SoundLibrary {
  private directory: string;
  private files: SoundFile[] = [];
  private readonly log: LibraryLog;

  constructor(directory: string, options: SoundLibraryOptions = {}) {
    this.directory = path.resolve(directory);
    this.log = options.log ?? logger;
  }

  getDirectory() {
    return this.directory;
  }

  setDirectory(directory: string): SoundFile[] {
    this.directory = path.resolve(directory);
    return this.reload();
  }

  reload(): SoundFile[] {
    if (!fs.existsSync(this.directory)) {
      fs.mkdirSync(this.directory, { recursive: true });
      this.log.info({ directory: this.directory }, 'Created sound directory');
    }

    const entries = fs.readdirSync(this.directory, { withFileTypes: true });
    this.files = entries
      .filter(entry => entry.isFile() && isSupportedSound(entry.name))
      .map(entry => ({ name: entry.name, path: path.join(this.directory, entry.name) }))
      .sort((a, b) => a.name.localeCompare(b.name));

    if (this.files.length === 0) {
      this.log.warn({ directory: this.directory }, 'No sound files found, the default tone will be used');
    } else {
      this.log.info({ directory: this.directory, count: this.files.length }, 'Sound library loaded');
    }
    return this.list();
  }

  list(): SoundFile[] {
    return this.files.map(file => ({ ...file }));
  }

  size() {
    return this.files.length;
  }

  pick(random: () => number = Math.random): SoundFile | null {
    if (this.files.length === 0) {
      return null;
    }
    const index = Math.min(this.files.length - 1, Math.floor(random() * this.files.length));
    return this.files[index] ?? null;
  }
}

export function isSupportedSound(fileName: string) {
  const extension = path.extname(fileName).toLowerCase();
  return SUPPORTED_SOUND_EXTENSIONS.some(candidate => candidate === extension);
}
