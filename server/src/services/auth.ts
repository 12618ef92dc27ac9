import type { Auth, DecodedIdToken } from "firebase-admin/auth"
import { ServiceError } from "../lib/errors"
import type { AuthError, AuthOutcome, Identity, Result } from "../types"

export interface TokenVerifier {
  readonly available: boolean
  verify(credential: string): Promise<Result<Identity, AuthError>>
}

const BEARER_PREFIX = "Bearer "

const UNAVAILABLE_CODES = new Set(["app/network-error", "app/no-app", "auth/internal-error"])

/** Bounded prefix/suffix of a credential, safe for logs and error payloads. */
export function maskToken(token: string): string {
  if (token.length <= 12) return "***"
  return `${token.slice(0, 6)}...${token.slice(-4)}`
}

export function parseBearer(headerValue: string | null | undefined): string | null {
  if (!headerValue || !headerValue.startsWith(BEARER_PREFIX)) return null
  const token = headerValue.slice(BEARER_PREFIX.length).trim()
  return token.length > 0 ? token : null
}

function errorCode(error: unknown): string | null {
  if (!error || typeof error !== "object" || !("code" in error)) return null
  return typeof error.code === "string" ? error.code : null
}

function identityFromToken(decoded: DecodedIdToken): Identity {
  return {
    uid: decoded.uid,
    email: typeof decoded.email === "string" ? decoded.email : null,
    name: typeof decoded.name === "string" ? decoded.name : null,
  }
}

export function createFirebaseTokenVerifier(auth: Pick<Auth, "verifyIdToken"> | null): TokenVerifier {
  return {
    available: auth !== null,

    async verify(credential) {
      if (!auth) {
        return {
          ok: false,
          error: { kind: "service_unavailable", message: "Identity provider is not configured" },
        }
      }

      try {
        const decoded = await auth.verifyIdToken(credential)
        return { ok: true, value: identityFromToken(decoded) }
      } catch (error) {
        const code = errorCode(error)
        console.warn("[auth] token verification failed", { code, token: maskToken(credential) })
        if (code && UNAVAILABLE_CODES.has(code)) {
          return {
            ok: false,
            error: { kind: "service_unavailable", message: "Identity provider is unreachable" },
          }
        }
        return { ok: false, error: { kind: "invalid_token", message: "Invalid authentication token" } }
      }
    },
  }
}

/**
 * Mandatory authentication: a missing credential is itself a failure, and
 * verifier failures propagate unchanged.
 */
export async function requireAuth(
  verifier: TokenVerifier,
  credential: string | null | undefined
): Promise<Result<Identity, AuthError>> {
  if (!credential) {
    return { ok: false, error: { kind: "missing_credential", message: "Authentication required" } }
  }
  return verifier.verify(credential)
}

/**
 * Optional authentication. Resolves to null for a missing or malformed header,
 * an invalid token or an unavailable provider. Never rejects.
 */
export async function optionalAuth(
  verifier: TokenVerifier,
  headerValue: string | null | undefined
): Promise<Identity | null> {
  const token = parseBearer(headerValue)
  if (!token || !verifier.available) return null
  try {
    const result = await verifier.verify(token)
    if (!result.ok) return null
    console.info(`[auth] optional auth resolved user ${result.value.uid}`)
    return result.value
  } catch (error) {
    console.warn("[auth] optional auth degraded", { token: maskToken(token), error })
    return null
  }
}

export function resolveAuthOutcome(identity: Identity | null): AuthOutcome {
  return identity ? { kind: "authenticated", identity } : { kind: "unauthenticated" }
}

export function authErrorToServiceError(error: AuthError): ServiceError {
  switch (error.kind) {
    case "missing_credential":
      return new ServiceError("AUTH_MISSING", error.message)
    case "invalid_token":
      return new ServiceError("AUTH_INVALID", error.message)
    case "service_unavailable":
      return new ServiceError("PROVIDER_UNAVAILABLE", error.message, { provider: "identity" })
  }
}
