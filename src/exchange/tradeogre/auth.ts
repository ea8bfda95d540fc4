import { readFileSync, statSync } from 'node:fs';
import type { Logger } from '../../logger.js';
import { err, ok } from '../../types/index.js';
import type { Result } from '../../types/index.js';

export interface Credentials {
  readonly key: string;
  readonly secret: string;
}

/** TradeOgre private endpoints take HTTP basic auth: key as user, secret as password. */
export function basicAuthHeader(credentials: Credentials): string {
  const token = Buffer.from(`${credentials.key}:${credentials.secret}`, 'utf8').toString('base64');
  return `Basic ${token}`;
}

/** Key on the first line, secret on the second. */
export function parseCredentials(text: string): Result<Credentials> {
  const lines = text.trim().split(/\r?\n/);
  if (lines.length < 2) {
    return err('Key file must contain key on first line and secret on second line');
  }
  const key = (lines[0] ?? '').trim();
  const secret = (lines[1] ?? '').trim();
  if (!key || !secret) {
    return err('Key and secret cannot be empty');
  }
  return ok({ key, secret });
}

/** group or other may read the file */
export function isExposedMode(mode: number): boolean {
  return (mode & 0o077) !== 0;
}

export function loadCredentials(path: string, log?: Logger): Result<Credentials> {
  let text: string;
  let mode: number;
  try {
    text = readFileSync(path, 'utf8');
    mode = statSync(path).mode;
  } catch (e) {
    return err(`Could not read credentials file ${path}: ${String(e)}`);
  }
  if (isExposedMode(mode)) {
    log?.warn(
      { file: path, mode: (mode & 0o777).toString(8) },
      'Credentials file is readable by other users; chmod 600 recommended',
    );
  }
  return parseCredentials(text);
}
