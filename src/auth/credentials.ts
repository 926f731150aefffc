/**
 * Credential parsing
 *
 * The credential arrives as one string, "<identifier> <secret>", split on
 * the first space so the secret itself may contain spaces.
 */

export interface Credential {
  identifier: string;
  secret: string;
}

export const CREDENTIAL_GUIDANCE = [
  'Missing credentials. Set GOOGLE_PW to "<account> <password>".',
  'For example:',
  "  export GOOGLE_PW='your.email@gmail.com your_password'"
].join('\n');

export function parseCredential(raw: string | undefined): Credential | null {
  if (!raw) {
    return null;
  }

  const separator = raw.indexOf(' ');
  if (separator === -1) {
    return null;
  }

  const identifier = raw.slice(0, separator);
  const secret = raw.slice(separator + 1);
  if (!identifier || !secret) {
    return null;
  }

  return { identifier, secret };
}
