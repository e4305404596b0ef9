/**
 * Credential sources for the tool adapter.
 *
 * A provider is asked for credentials on every tool call, so a rotated key
 * takes effect without rebuilding the adapter.
 */

import { AuthenticationError } from '../errors/index.js';
import { ENV_VARS } from '../config/index.js';

export type Credentials = Record<string, string | undefined>;

export interface CredentialProvider {
  getCredentials(): Promise<Credentials>;
}

/**
 * Key names checked for the API key, in priority order.
 */
export const API_KEY_NAMES = ['api_key', 'apiKey', 'API_KEY'] as const;

/**
 * Reads the API key from one environment variable.
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  private readonly variable: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(variable: string = ENV_VARS.API_KEY, env: NodeJS.ProcessEnv = process.env) {
    this.variable = variable;
    this.env = env;
  }

  async getCredentials(): Promise<Credentials> {
    return { api_key: this.env[this.variable] };
  }
}

/**
 * Returns a fixed credential mapping.
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: Credentials;

  constructor(credentials: Credentials) {
    this.credentials = { ...credentials };
  }

  async getCredentials(): Promise<Credentials> {
    return { ...this.credentials };
  }
}

/**
 * Picks the first non-blank API key from a credential mapping.
 *
 * @throws {AuthenticationError} If none of {@link API_KEY_NAMES} holds a key
 */
export function resolveApiKey(credentials: Credentials): string {
  for (const name of API_KEY_NAMES) {
    const candidate = credentials[name]?.trim();
    if (candidate) {
      return candidate;
    }
  }
  throw new AuthenticationError(`No API key found in credentials (expected one of: ${API_KEY_NAMES.join(', ')})`);
}
