/**
 * Unit tests for ConfigLoader
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError } from '@gpgpipe/core';
import { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import { MemoryFileSystem } from '../../helpers/MemoryFileSystem.js';

const HOME = '/home/tester';
const PROJECT = '/work/project';
const GLOBAL_CONFIG = `${HOME}/.gpgpipe/config.yml`;
const PROJECT_CONFIG = `${PROJECT}/.gpgpipe/config.yml`;

describe('ConfigLoader', () => {
  let fs: MemoryFileSystem;
  let env: NodeJS.ProcessEnv;

  const createLoader = (): ConfigLoader => new ConfigLoader(fs, { homeDir: HOME, env });

  beforeEach(() => {
    fs = new MemoryFileSystem();
    env = {};
  });

  it('should load default configuration', async () => {
    const config = await createLoader().load({ projectRoot: PROJECT });

    expect(config).toEqual({
      gpg: {
        timeoutMs: 30000,
        trustModel: 'always',
        batch: true,
        armor: false,
        pinentryLoopback: true,
      },
      logging: { level: 'info', fileLogging: true },
    });
    expect(config).toEqual(createLoader().getDefaults());
  });

  it('should resolve config paths', () => {
    const loader = createLoader();

    expect(loader.getConfigPath('global')).toBe(GLOBAL_CONFIG);
    expect(loader.getConfigPath('project', PROJECT)).toBe(PROJECT_CONFIG);
  });

  it('should let project config override global config', async () => {
    fs.setFile(GLOBAL_CONFIG, 'gpg:\n  timeoutMs: 10000\n  armor: true\nlogging:\n  level: warn\n');
    fs.setFile(PROJECT_CONFIG, 'gpg:\n  timeoutMs: 5000\n');

    const config = await createLoader().load({ projectRoot: PROJECT });

    expect(config.gpg.timeoutMs).toBe(5000);
    expect(config.gpg.armor).toBe(true);
    expect(config.logging.level).toBe('warn');
  });

  it('should ignore project config when no project root is given', async () => {
    fs.setFile(PROJECT_CONFIG, 'gpg:\n  armor: true\n');

    const config = await createLoader().load();

    expect(config.gpg.armor).toBe(false);
  });

  it('should let environment variables override config files', async () => {
    fs.setFile(PROJECT_CONFIG, 'gpg:\n  path: /usr/bin/gpg\n  trustModel: pgp\n');
    env = {
      GPGPIPE_GPG_PATH: '/opt/gnupg/bin/gpg',
      GPGPIPE_HOMEDIR: '/tmp/gnupg',
      GPGPIPE_TIMEOUT_MS: '0',
      GPGPIPE_TRUST_MODEL: 'Direct',
    };

    const config = await createLoader().load({ projectRoot: PROJECT });

    expect(config.gpg).toMatchObject({
      path: '/opt/gnupg/bin/gpg',
      homeDir: '/tmp/gnupg',
      timeoutMs: 0,
      trustModel: 'direct',
    });
  });

  it('should read the project .env file below the real environment', async () => {
    fs.setFile(`${PROJECT}/.env`, 'GPGPIPE_HOMEDIR=/from/dotenv\nGPGPIPE_TIMEOUT_MS=1500\n');
    env = { GPGPIPE_HOMEDIR: '/from/env' };

    const config = await createLoader().load({ projectRoot: PROJECT });

    expect(config.gpg.homeDir).toBe('/from/env');
    expect(config.gpg.timeoutMs).toBe(1500);
  });

  it('should let CLI flags override everything else', async () => {
    fs.setFile(GLOBAL_CONFIG, 'gpg:\n  timeoutMs: 10000\n');
    env = { GPGPIPE_TIMEOUT_MS: '20000', GPGPIPE_GPG_PATH: '/env/gpg' };

    const config = await createLoader().load({
      projectRoot: PROJECT,
      cliFlags: { gpg: { timeoutMs: 42 } },
    });

    expect(config.gpg.timeoutMs).toBe(42);
    expect(config.gpg.path).toBe('/env/gpg');
  });

  it('should reject an invalid timeout variable', async () => {
    env = { GPGPIPE_TIMEOUT_MS: '-5' };

    await expect(createLoader().load()).rejects.toThrow(
      new ConfigurationError('GPGPIPE_TIMEOUT_MS must be a non-negative integer, got "-5"')
    );
  });

  it('should reject an unknown trust model variable', async () => {
    env = { GPGPIPE_TRUST_MODEL: 'bogus' };

    await expect(createLoader().load()).rejects.toThrow(
      'GPGPIPE_TRUST_MODEL must be one of pgp, classic, direct, always, auto, got "bogus"'
    );
  });

  it('should reject a config file that does not match the schema', async () => {
    fs.setFile(PROJECT_CONFIG, 'gpg:\n  timeoutMs: soon\n');

    const error = await createLoader()
      .load({ projectRoot: PROJECT })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: `Invalid project config at ${PROJECT_CONFIG}: gpg.timeoutMs: Expected number, received string`,
    });
  });

  it('should skip config files that cannot be read or parsed', async () => {
    fs.setFile(GLOBAL_CONFIG, 'gpg:\n  armor: true\n');
    fs.unreadable.add(GLOBAL_CONFIG);
    fs.setFile(PROJECT_CONFIG, 'gpg: [unclosed\n');

    const config = await createLoader().load({ projectRoot: PROJECT });

    expect(config).toEqual(createLoader().getDefaults());
  });

  it('should treat an empty config file as absent', async () => {
    fs.setFile(GLOBAL_CONFIG, '');
    fs.setFile(PROJECT_CONFIG, '# nothing configured yet\n');

    const config = await createLoader().load({ projectRoot: PROJECT });

    expect(config).toEqual(createLoader().getDefaults());
  });

  it('should save configuration as YAML, creating the directory', async () => {
    const loader = createLoader();

    await loader.save({ gpg: { path: '/usr/bin/gpg', armor: true } }, 'project', PROJECT);

    expect(fs.directories.has(`${PROJECT}/.gpgpipe`)).toBe(true);
    expect(fs.files.get(PROJECT_CONFIG)).toBe('gpg:\n  path: /usr/bin/gpg\n  armor: true\n');
    await expect(loader.load({ projectRoot: PROJECT })).resolves.toMatchObject({
      gpg: { path: '/usr/bin/gpg', armor: true },
    });
  });

  it('should validate a complete configuration', () => {
    const loader = createLoader();

    expect(loader.validate({ gpg: { armor: true } }).gpg.armor).toBe(true);
    expect(() => loader.validate({ logging: { level: 'verbose' } })).toThrow(ConfigurationError);
  });
});
