// Centralized KeyGate: resolves the backend credential once per dispatch attempt

import { MissingKeyError } from './errors/AIServiceErrors';
import { failure, success, type Outcome } from './types';

/**
 * Platform secret store. Implementations live outside the broker.
 */
export interface CredentialProvider {
  getSecret(name: string): Promise<string | undefined>;
}

/**
 * Reads secrets from environment variables: "nim_api_key" -> NIM_API_KEY.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  static variableFor(name: string): string {
    return name
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .replace(/[^A-Za-z0-9]+/g, '_')
      .toUpperCase();
  }

  async getSecret(name: string): Promise<string | undefined> {
    return this.env[EnvCredentialProvider.variableFor(name)];
  }
}

export class KeyGate {
  private lastFound: boolean | null = null;

  constructor(
    private readonly credentials: CredentialProvider,
    private readonly secretName: string
  ) {}

  /**
   * Blank or absent secrets, and a store that throws, all resolve to MissingKeyError.
   */
  async resolveKey(): Promise<Outcome<string, MissingKeyError>> {
    let raw: string | undefined;
    try {
      raw = await this.credentials.getSecret(this.secretName);
    } catch (err) {
      console.warn(`[KeyGate] credential lookup for "${this.secretName}" failed:`, err);
      raw = undefined;
    }

    const apiKey = (raw ?? '').trim();
    if (!apiKey) {
      if (this.lastFound !== false) {
        console.warn(`[KeyGate] "${this.secretName}" is not configured`);
      }
      this.lastFound = false;
      return failure(new MissingKeyError(this.secretName));
    }
    this.lastFound = true;
    return success(apiKey);
  }

  /**
   * Result of the most recent lookup; null before the first one.
   */
  get keyFound(): boolean | null {
    return this.lastFound;
  }
}

export default KeyGate;
