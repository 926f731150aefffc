import { test, expect } from '@playwright/test';

import { CREDENTIAL_GUIDANCE, parseCredential } from '../../src/auth/credentials';

test.describe('parseCredential', () => {
  test('splits on the first space only', () => {
    expect(parseCredential('user@example.com secret123')).toEqual({
      identifier: 'user@example.com',
      secret: 'secret123'
    });
    expect(parseCredential('user@example.com pass with spaces')).toEqual({
      identifier: 'user@example.com',
      secret: 'pass with spaces'
    });
  });

  for (const raw of [undefined, '', 'user@example.com', ' secret123', 'user@example.com ']) {
    test(`rejects ${JSON.stringify(raw)}`, () => {
      expect(parseCredential(raw)).toBeNull();
    });
  }

  test('guidance names the variable and its format', () => {
    expect(CREDENTIAL_GUIDANCE).toContain('GOOGLE_PW');
    expect(CREDENTIAL_GUIDANCE).toContain("export GOOGLE_PW='your.email@gmail.com your_password'");
  });
});
