import type { CredentialProvider } from './KeyGate';

/**
 * In-memory credential store for tests. Counts lookups so tests can assert
 * that the key is queried once per dispatch attempt.
 */
export class InMemoryCredentialProvider implements CredentialProvider {
  private secrets = new Map<string, string>();
  private failWith: Error | null = null;
  public lookups = 0;

  constructor(initial: Record<string, string> = {}) {
    for (const [k, v] of Object.entries(initial)) this.secrets.set(k, v);
  }

  setSecret(name: string, value: string): void {
    this.secrets.set(name, value);
  }

  removeSecret(name: string): void {
    this.secrets.delete(name);
  }

  /**
   * Make every lookup reject, as a broken platform store would.
   */
  failLookups(err: Error | null): void {
    this.failWith = err;
  }

  async getSecret(name: string): Promise<string | undefined> {
    this.lookups++;
    if (this.failWith) throw this.failWith;
    return this.secrets.get(name);
  }
}

export default InMemoryCredentialProvider;
