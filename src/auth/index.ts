/**
 * Request authentication for the Airtable client.
 *
 * Airtable accepts personal access tokens (and legacy API keys) as bearer
 * tokens. A token never refreshes itself; a rotated key builds a new client.
 */

import { AuthMethod, SecretString } from '../config/index.js';

export type AuthHeaders = Record<string, string>;

export interface AuthProvider {
  getAuthHeaders(): Promise<AuthHeaders>;
}

export class PatAuthProvider implements AuthProvider {
  private readonly token: SecretString;

  constructor(token: SecretString) {
    this.token = token;
  }

  async getAuthHeaders(): Promise<AuthHeaders> {
    return { Authorization: `Bearer ${this.token.expose()}` };
  }
}

/**
 * @example
 * ```typescript
 * const auth = createAuthProvider({ type: 'pat', token: SecretString.from('test-token') });
 * ```
 */
export function createAuthProvider(auth: AuthMethod): AuthProvider {
  switch (auth.type) {
    case 'pat':
      return new PatAuthProvider(auth.token);
  }
}
