import type { Request } from 'express';
import { AccountView, findAccountByApiKey } from '../services/accounts';

export function apiKeyOf(req: Request): string | null {
  const header = req.header('x-api-key');
  if (header && header.trim()) return header.trim();
  const auth = req.header('authorization');
  const m = auth ? auth.match(/^Bearer\s+(.+)$/i) : null;
  return m ? m[1].trim() : null;
}

export async function authenticate(req: Request): Promise<AccountView | null> {
  const key = apiKeyOf(req);
  if (!key) return null;
  return findAccountByApiKey(key);
}
