/**
 * Log Redaction
 *
 * Masks configured secrets and sensitive URL parts before a message is
 * written anywhere.
 */

/**
 * Environment variables whose values are masked when they differ from the
 * shipped placeholder defaults
 */
export const SENSITIVE_ENV_DEFAULTS: Readonly<Record<string, string>> = {
  M3U_SOURCE_URL: 'https://your-provider.com/playlist.m3u',
  EPG_SOURCE_URL: 'https://your-epg-provider.com/epg.xml.gz',
  S3_ENDPOINT_URL: 'https://s3.amazonaws.com',
  S3_REGION: 'us-east-1',
  S3_OBJECT_KEY: 'playlist.m3u',
  S3_EPG_KEY: 'epg.xml.gz',
  S3_BUCKET_NAME: 'your-bucket-name',
  AWS_ACCESS_KEY_ID: '',
  AWS_SECRET_ACCESS_KEY: '',
};

const DEFAULT_URLS = new Set<string>([
  ...Object.values(SENSITIVE_ENV_DEFAULTS).filter((value) => value.startsWith('http')),
  'https://your-bucket-name.s3.amazonaws.com/playlist.m3u',
]);

const SENSITIVE_TEXT_PATTERNS: RegExp[] = [
  /secret/i,
  /token/i,
  /key/i,
  /credential/i,
  /password/i,
  /code/i,
  /auth/i,
  /session/i,
  /^[A-Za-z0-9_-]{20,}$/,
];

const SENSITIVE_PARAMS = new Set([
  'token',
  'key',
  'secret',
  'password',
  'auth',
  'session',
  'code',
  'access_token',
  'refresh_token',
  'api_key',
  'client_secret',
  'credential',
  'signature',
  'username',
  'user',
  'pass',
]);

const URL_PATTERN = /https?:\/\/[^\s'"<>]+/g;

/**
 * Mask a value, keeping a few characters at each end of long values
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  const visible = Math.max(3, Math.floor(value.length / 4));
  return `${value.slice(0, visible)}${'*'.repeat(value.length - 2 * visible)}${value.slice(-visible)}`;
}

export function isPotentiallySensitive(text: string): boolean {
  return SENSITIVE_TEXT_PATTERNS.some((pattern) => pattern.test(text));
}

function maskPathSegment(segment: string): string {
  if (!segment || !isPotentiallySensitive(segment)) return segment;
  if (segment.length <= 8) return '*'.repeat(segment.length);
  const visible = Math.max(1, Math.min(3, Math.floor(segment.length / 4)));
  return `${segment.slice(0, visible)}${'*'.repeat(segment.length - 2 * visible)}${segment.slice(-visible)}`;
}

function maskQuery(query: string): string {
  return query
    .split('&')
    .map((pair) => {
      const eq = pair.indexOf('=');
      if (eq === -1) return pair;
      const key = pair.slice(0, eq);
      const value = pair.slice(eq + 1);
      if (SENSITIVE_PARAMS.has(key.toLowerCase()) || isPotentiallySensitive(key)) {
        return `${key}=${'*'.repeat(Math.min(value.length, 20))}`;
      }
      return pair;
    })
    .join('&');
}

/**
 * Mask the path, query and fragment of a URL, keeping scheme and host
 */
export function maskUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `${url.split('://')[0]}://***.***`;
  }

  const path = parsed.pathname.split('/').map(maskPathSegment).join('/');
  const query = parsed.search ? `?${maskQuery(parsed.search.slice(1))}` : '';
  const fragment = parsed.hash ? `#${'*'.repeat(Math.min(parsed.hash.length - 1, 10))}` : '';

  return `${parsed.protocol}//${parsed.host}${path}${query}${fragment}`;
}

/**
 * Replace secrets and sensitive URL parts in a log message
 */
export function sanitizeLogMessage(
  message: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const secrets = Object.entries(SENSITIVE_ENV_DEFAULTS)
    .map(([name, fallback]) => {
      const value = env[name];
      return value && value !== fallback ? value : null;
    })
    .filter((value): value is string => value !== null)
    .sort((a, b) => b.length - a.length);

  let sanitized = message;
  for (const secret of secrets) {
    sanitized = sanitized.split(secret).join(maskValue(secret));
  }

  for (const url of message.match(URL_PATTERN) ?? []) {
    if (!DEFAULT_URLS.has(url)) {
      sanitized = sanitized.split(url).join(maskUrl(url));
    }
  }

  return sanitized;
}
