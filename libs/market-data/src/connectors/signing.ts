import crypto from 'crypto';

export const hmacSha256Base64 = (secret: string, payload: string): string =>
  crypto.createHmac('sha256', secret).update(payload).digest('base64');

export const withQuery = (path: string, params: Record<string, string>): string => {
  const query = new URLSearchParams(params).toString();
  return query ? `${path}?${query}` : path;
};

/** Reads `code` from a JSON envelope like `{ code: '200000', data }`. */
export const envelopeCode = (data: unknown): string | null => {
  if (typeof data !== 'object' || data === null || !('code' in data)) {
    return null;
  }
  const { code } = data;
  return code === undefined || code === null ? null : String(code);
};

export const envelopeMessage = (data: unknown): string => {
  if (typeof data === 'object' && data !== null && 'msg' in data && typeof data.msg === 'string') {
    return data.msg;
  }
  return 'no message';
};
