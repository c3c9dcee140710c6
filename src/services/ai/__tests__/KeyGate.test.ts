import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EnvCredentialProvider, KeyGate } from '../KeyGate';
import InMemoryCredentialProvider from '../KeyGate.testdouble';
import { MissingKeyError } from '../errors/AIServiceErrors';

describe('KeyGate', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('returns the trimmed key when present', async () => {
    const gate = new KeyGate(new InMemoryCredentialProvider({ nim_api_key: '  test-secret ' }), 'nim_api_key');
    expect(gate.keyFound).toBeNull();
    expect(await gate.resolveKey()).toEqual({ ok: true, value: 'test-secret' });
    expect(gate.keyFound).toBe(true);
  });

  it('treats a blank key as missing', async () => {
    const gate = new KeyGate(new InMemoryCredentialProvider({ nim_api_key: '   ' }), 'nim_api_key');
    const res = await gate.resolveKey();
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(MissingKeyError);
      expect(res.error.secretName).toBe('nim_api_key');
    }
    expect(gate.keyFound).toBe(false);
  });

  it('treats a throwing store as missing and logs it', async () => {
    const store = new InMemoryCredentialProvider({ nim_api_key: 'test-secret' });
    store.failLookups(new Error('vault offline'));
    const gate = new KeyGate(store, 'nim_api_key');
    expect((await gate.resolveKey()).ok).toBe(false);
    expect(console.warn).toHaveBeenCalledWith('[KeyGate] credential lookup for "nim_api_key" failed:', expect.any(Error));
  });

  it('looks the key up on every call and warns once per loss', async () => {
    const store = new InMemoryCredentialProvider();
    const gate = new KeyGate(store, 'nim_api_key');

    await gate.resolveKey();
    await gate.resolveKey();
    store.setSecret('nim_api_key', 'test-secret');
    expect((await gate.resolveKey()).ok).toBe(true);
    store.removeSecret('nim_api_key');
    await gate.resolveKey();

    expect(store.lookups).toBe(4);
    const missingWarnings = vi.mocked(console.warn).mock.calls.filter((c) => c[0] === '[KeyGate] "nim_api_key" is not configured');
    expect(missingWarnings).toHaveLength(2);
  });
});

describe('EnvCredentialProvider', () => {
  it('maps secret names to upper snake case variables', () => {
    expect(EnvCredentialProvider.variableFor('nim_api_key')).toBe('NIM_API_KEY');
    expect(EnvCredentialProvider.variableFor('nimApiKey')).toBe('NIM_API_KEY');
    expect(EnvCredentialProvider.variableFor('nim-api.key')).toBe('NIM_API_KEY');
  });

  it('reads from the supplied environment', async () => {
    const provider = new EnvCredentialProvider({ NIM_API_KEY: 'test-secret' });
    expect(await provider.getSecret('nim_api_key')).toBe('test-secret');
    expect(await provider.getSecret('other_key')).toBeUndefined();
  });
});
