import { verifyToken } from '@clerk/backend';

function readSubject(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null) return null;
  if ('sub' in payload && typeof payload.sub === 'string' && payload.sub) {
    return payload.sub;
  }
  if (
    'userId' in payload &&
    typeof payload.userId === 'string' &&
    payload.userId
  ) {
    return payload.userId;
  }
  return null;
}

function readVerificationError(result: unknown): string | null {
  if (typeof result !== 'object' || result === null) return null;
  if (!('errors' in result) || !Array.isArray(result.errors)) return null;
  const [first]: unknown[] = result.errors;
  if (first === undefined) return null;
  if (typeof first === 'object' && first !== null && 'message' in first) {
    return String(first.message);
  }
  return 'Unknown verification error';
}

/**
 * Verify a Clerk session token and return its subject, which is used as the
 * caller's address. Handles both the `{ data, errors }` envelope and a bare
 * payload.
 */
export async function verifyCallerToken(
  token: string,
  secretKey: string,
): Promise<string> {
  const result: unknown = await verifyToken(token, { secretKey });

  const error = readVerificationError(result);
  if (error) throw new Error(`Token verification failed: ${error}`);

  const direct = readSubject(result);
  if (direct) return direct;
  const wrapped =
    typeof result === 'object' && result !== null && 'data' in result
      ? readSubject(result.data)
      : null;
  if (!wrapped) throw new Error('Invalid token payload: no sub or userId claim');
  return wrapped;
}

export function extractBearerToken(
  header: string | string[] | undefined,
): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || !value.startsWith('Bearer ')) return null;
  return value.slice(7).trim() || null;
}
