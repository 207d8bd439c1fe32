import { registerSecret } from '../core/secrets.js';
import type { StepContext } from './types.js';

export function readToken(ctx: StepContext): string | undefined {
  const token = ctx.env[ctx.config.publish.tokenEnv];
  if (!token) {
    return undefined;
  }
  registerSecret(token);
  return token;
}

export function basicAuthHeader(token: string): string {
  const encoded = Buffer.from(`x-access-token:${token}`, 'utf8').toString('base64');
  registerSecret(encoded);
  return `AUTHORIZATION: basic ${encoded}`;
}

export function repositoryUrl(serverUrl: string, repository: string, token?: string): string {
  const url = new URL(`${repository}.git`, serverUrl.endsWith('/') ? serverUrl : `${serverUrl}/`);
  if (token) {
    url.username = 'x-access-token';
    url.password = token;
    registerSecret(url.password);
  }
  return url.toString();
}
