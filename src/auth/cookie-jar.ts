/**
 * Cookie Jar
 *
 * Session cookies are cached in a JSON file between runs. The file is only
 * a shortcut: anything missing, unreadable or malformed is treated as "no
 * cookies" and the run falls back to interactive sign-in.
 */

import * as fs from 'fs';
import { z } from 'zod';

import { logger } from '../logger';
import { attempt, type Result } from '../result';
import type { ContextLike, CookieRecord } from '../browser/types';

const cookieRecordSchema: z.ZodType<CookieRecord> = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(['Strict', 'Lax', 'None'])
});

export const cookieJarSchema = z.array(cookieRecordSchema);

/**
 * Read the saved cookie jar.
 *
 * @returns the cookies, or null when there is no usable file
 */
export async function loadPersistedCookies(filePath: string): Promise<CookieRecord[] | null> {
  if (!fs.existsSync(filePath)) {
    logger.info(`No saved cookies at ${filePath}`);
    return null;
  }

  const raw = await attempt('io', `read cookies from ${filePath}`, () =>
    fs.promises.readFile(filePath, 'utf-8')
  );
  if (!raw.ok) {
    return null;
  }

  const parsed = await attempt('io', `parse cookies from ${filePath}`, async (): Promise<unknown> =>
    JSON.parse(raw.value)
  );
  if (!parsed.ok) {
    return null;
  }

  const jar = cookieJarSchema.safeParse(parsed.value);
  if (!jar.success) {
    const issue = jar.error.issues[0];
    logger.warn(`Ignoring saved cookies at ${filePath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid format'}`);
    return null;
  }

  return jar.data;
}

/**
 * Load the saved jar into the browser context.
 *
 * @returns true only when cookies were actually added
 */
export async function applyPersistedCookies(context: ContextLike, filePath: string): Promise<boolean> {
  const cookies = await loadPersistedCookies(filePath);
  if (!cookies) {
    return false;
  }

  logger.info(`Trying ${cookies.length} saved cookies`);
  const added = await attempt('io', 'add saved cookies', () => context.addCookies(cookies));
  return added.ok;
}

/**
 * Write the context's current cookies to the jar file.
 *
 * @returns number of cookies written
 */
export async function persistCookies(context: ContextLike, filePath: string): Promise<Result<number>> {
  const saved = await attempt('io', `save cookies to ${filePath}`, async () => {
    const cookies = await context.cookies();
    await fs.promises.writeFile(filePath, JSON.stringify(cookies, null, 2), { encoding: 'utf-8', mode: 0o600 });
    // mode only applies when the file is created
    await fs.promises.chmod(filePath, 0o600);
    return cookies.length;
  });

  if (saved.ok) {
    logger.info(`Saved ${saved.value} cookies to ${filePath}`);
  }
  return saved;
}
