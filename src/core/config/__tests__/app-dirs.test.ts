import { describe, it, expect } from '@jest/globals';
import os from 'node:os';
import path from 'node:path';
import { getAppDataDir, getDefaultDownloadRoot } from '../app-dirs.js';

const onLinux = process.platform === 'linux' ? it : it.skip;

describe('getAppDataDir', () => {
  onLinux('should honour XDG_DATA_HOME', () => {
    expect(getAppDataDir('feedgrab', { XDG_DATA_HOME: '/data/xdg' })).toBe(path.join('/data/xdg', 'feedgrab'));
  });

  onLinux('should fall back to ~/.local/share', () => {
    expect(getAppDataDir('feedgrab', {})).toBe(path.join(os.homedir(), '.local', 'share', 'feedgrab'));
  });
});

describe('getDefaultDownloadRoot', () => {
  onLinux('should place downloads under the app data directory', () => {
    expect(getDefaultDownloadRoot({ XDG_DATA_HOME: '/data/xdg' })).toBe(
      path.join('/data/xdg', 'feedgrab', 'downloads')
    );
  });
});
