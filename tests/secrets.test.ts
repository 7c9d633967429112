import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { resolveSecret } from '../src/secrets.js';

describe('resolveSecret', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'rqc-bridge-secrets-'));
  });

  it('should return the plain variable when no _FILE is set', () => {
    expect(resolveSecret('RQC_BRIDGE_HOST_TOKEN', { RQC_BRIDGE_HOST_TOKEN: 'test-token' })).toBe('test-token');
  });

  it('should return undefined when neither is set', () => {
    expect(resolveSecret('RQC_BRIDGE_HOST_TOKEN', {})).toBeUndefined();
  });

  it('should read and trim the file named by _FILE', () => {
    const filePath = join(tempDir, 'token.txt');
    writeFileSync(filePath, '  test-token-from-file \n\n');

    expect(resolveSecret('RQC_BRIDGE_HOST_TOKEN', { RQC_BRIDGE_HOST_TOKEN_FILE: filePath })).toBe('test-token-from-file');
  });

  it('should prefer the file over the plain variable', () => {
    const filePath = join(tempDir, 'token.txt');
    writeFileSync(filePath, 'from-file');

    expect(
      resolveSecret('RQC_BRIDGE_HOST_TOKEN', {
        RQC_BRIDGE_HOST_TOKEN: 'from-env',
        RQC_BRIDGE_HOST_TOKEN_FILE: filePath,
      })
    ).toBe('from-file');
  });

  it('should fail loudly when the file cannot be read', () => {
    const missing = join(tempDir, 'missing.txt');

    expect(() => resolveSecret('RQC_BRIDGE_HOST_TOKEN', { RQC_BRIDGE_HOST_TOKEN_FILE: missing })).toThrow(
      `Failed to read secret file for RQC_BRIDGE_HOST_TOKEN_FILE (${missing})`
    );
  });
});
