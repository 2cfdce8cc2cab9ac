import { describe, it, expect } from 'vitest';
import { ConfigError, ErrorCode } from '@pkbridge/backend-contracts';
import { MemoryKeyFile } from '@pkbridge/backend-testing';
import { loadBackendConfig } from '../config.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('loadBackendConfig', () => {
  it('should read the pkbridge group and apply defaults', () => {
    const keyFile = new MemoryKeyFile({ pkbridge: { ScriptsDir: '/srv/pkbridge/scripts' } });

    expect(loadBackendConfig(keyFile, {})).toEqual({
      scriptsDir: '/srv/pkbridge/scripts',
      moduleName: 'pkbridge',
      callTimeoutMs: 60_000,
    });
  });

  it('should read every key', () => {
    const keyFile = new MemoryKeyFile({
      pkbridge: { ScriptsDir: '/srv/scripts', ModuleName: 'pm_bridge', CallTimeoutMs: '2500' },
    });

    expect(loadBackendConfig(keyFile, {})).toEqual({
      scriptsDir: '/srv/scripts',
      moduleName: 'pm_bridge',
      callTimeoutMs: 2500,
    });
  });

  it('should ignore other groups', () => {
    const keyFile = new MemoryKeyFile({ Daemon: { ScriptsDir: '/elsewhere' } });

    expect(() => loadBackendConfig(keyFile, {})).toThrow(ConfigError);
  });

  it('should let environment variables win over the key file', () => {
    const keyFile = new MemoryKeyFile({ pkbridge: { ScriptsDir: '/srv/scripts', CallTimeoutMs: '2500' } });

    const config = loadBackendConfig(keyFile, {
      PKBRIDGE_SCRIPTS_DIR: '/tmp/scripts',
      PKBRIDGE_MODULE_NAME: 'local',
      PKBRIDGE_CALL_TIMEOUT_MS: '100',
    });

    expect(config).toEqual({ scriptsDir: '/tmp/scripts', moduleName: 'local', callTimeoutMs: 100 });
  });

  it('should report a missing scripts directory by key name', () => {
    const error = thrown(() => loadBackendConfig(new MemoryKeyFile(), {}));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: ErrorCode.FAILED_CONFIG_PARSING,
      message: 'Invalid [pkbridge] configuration: ScriptsDir: Required',
      details: { problems: ['ScriptsDir: Required'] },
    });
  });

  it('should reject an invalid module name', () => {
    const keyFile = new MemoryKeyFile({ pkbridge: { ScriptsDir: '/srv/scripts', ModuleName: 'Bad Name' } });

    expect(() => loadBackendConfig(keyFile, {})).toThrow(
      'Invalid [pkbridge] configuration: ModuleName: must be lower case letters, digits, - or _'
    );
  });

  it('should reject a timeout that is not a positive integer', () => {
    const keyFile = new MemoryKeyFile({ pkbridge: { ScriptsDir: '/srv/scripts', CallTimeoutMs: '-5' } });

    expect(() => loadBackendConfig(keyFile, {})).toThrow(/^Invalid \[pkbridge\] configuration: CallTimeoutMs: /);
  });
});
