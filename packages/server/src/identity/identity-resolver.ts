/**
 * Identity resolution for the registration handshake.
 *
 * A bearer token wins over a bare login. Tokens are HS256 JWTs carrying a
 * `login` claim. Either way, the login must be known to the legacy
 * directory.
 */

import jwt from 'jsonwebtoken';
import type { LegacyDirectory } from '../legacy/types.js';
import type { IdentityMetadata } from '../sessions/types.js';

export interface IdentityCredentials {
  token?: string;
  login?: string;
}

export interface IdentityResolver {
  resolve(credentials: IdentityCredentials): Promise<IdentityMetadata | null>;
}

export class JwtIdentityResolver implements IdentityResolver {
  constructor(
    private readonly secret: string,
    private readonly directory: LegacyDirectory,
  ) {}

  async resolve(credentials: IdentityCredentials): Promise<IdentityMetadata | null> {
    const login = credentials.token ? this.loginFromToken(credentials.token) : credentials.login;
    if (!login) return null;

    const user = await this.directory.findUser(login);
    if (!user) {
      console.warn(`[IdentityResolver] Unknown login: ${login}`);
      return null;
    }
    return { login: user.login, id: user.id, fullName: user.fullName };
  }

  private loginFromToken(token: string): string | null {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (err) {
      console.warn('[IdentityResolver] Rejected token:', err instanceof Error ? err.message : err);
      return null;
    }
    if (typeof decoded === 'string' || typeof decoded.login !== 'string' || decoded.login === '') {
      return null;
    }
    return decoded.login;
  }
}
