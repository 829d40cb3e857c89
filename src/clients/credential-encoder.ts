import { b64 } from '../utils/crypto-helpers';

/**
 * Maps login credentials to the token the portal's login form expects.
 * Swap the implementation to match the deployment's portal.
 */
export interface CredentialEncoder {
  encode(username: string, password: string): string;
}

/**
 * base64(username) + "%%%" + base64(password)
 */
export class Base64CredentialEncoder implements CredentialEncoder {
  constructor(private readonly separator = '%%%') {}

  encode(username: string, password: string): string {
    return `${b64(Buffer.from(username, 'utf8'))}${this.separator}${b64(Buffer.from(password, 'utf8'))}`;
  }
}
