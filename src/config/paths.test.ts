import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';

vi.mock('node:fs', () => ({
  mkdirSync: vi.fn(),
  chmodSync: vi.fn(),
}));

import {
  resolveConfigDir,
  ensureConfigDir,
  configFilePath,
  settingsPath,
  credentialsPath,
  costStorePath,
  resolveStorePath,
} from './paths.js';
import { mkdirSync, chmodSync } from 'node:fs';

const HOME_ENV = 'COSTGUARD_HOME';

describe('config paths', () => {
  const originalHome = process.env[HOME_ENV];

  afterEach(() => {
    if (originalHome === undefined) {
      delete process.env[HOME_ENV];
    } else {
      process.env[HOME_ENV] = originalHome;
    }
    vi.clearAllMocks();
  });

  it('defaults to ~/.costguard', () => {
    delete process.env[HOME_ENV];
    expect(resolveConfigDir()).toBe(join(homedir(), '.costguard'));
  });

  it('ignores an empty COSTGUARD_HOME', () => {
    process.env[HOME_ENV] = '';
    expect(resolveConfigDir()).toBe(join(homedir(), '.costguard'));
  });

  it('creates the directory and locks it down', () => {
    process.env[HOME_ENV] = '/srv/costguard';

    expect(ensureConfigDir()).toBe('/srv/costguard');
    expect(mkdirSync).toHaveBeenCalledWith('/srv/costguard', { recursive: true, mode: 0o700 });
    expect(chmodSync).toHaveBeenCalledWith('/srv/costguard', 0o700);
  });

  describe('under COSTGUARD_HOME', () => {
    beforeEach(() => {
      process.env[HOME_ENV] = '/srv/costguard';
    });

    it('places each config file in the directory', () => {
      expect(settingsPath()).toBe(join('/srv/costguard', 'config.json'));
      expect(credentialsPath()).toBe(join('/srv/costguard', 'credentials.json'));
      expect(costStorePath()).toBe(join('/srv/costguard', 'costs.db'));
      expect(configFilePath('store')).toBe(costStorePath());
    });

    it.each([
      [undefined, join('/srv/costguard', 'costs.db')],
      [':memory:', ':memory:'],
      ['/data/costs.db', '/data/costs.db'],
      ['~/costs.db', join(homedir(), 'costs.db')],
      ['archive/costs.db', join('/srv/costguard', 'archive/costs.db')],
    ])('resolves store path %s', (configured, expected) => {
      expect(resolveStorePath(configured)).toBe(expected);
    });
  });
});
