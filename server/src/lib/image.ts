import { ServiceError } from "./errors"

export interface DecodedImage {
  mimeType: string
  base64: string
  byteLength: number
}

const DATA_URL_PATTERN = /^data:([\w.+-]+\/[\w.+-]+);base64,(.*)$/is
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

const SIGNATURES: Array<{ mimeType: string; bytes: number[]; offset?: number }> = [
  { mimeType: "image/jpeg", bytes: [0xff, 0xd8, 0xff] },
  { mimeType: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { mimeType: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  { mimeType: "image/webp", bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 },
]

export function estimateDecodedBytes(base64: string): number {
  const padding = base64.endsWith("==") ? 2 : base64.endsWith("=") ? 1 : 0
  return Math.max(0, Math.floor((base64.length * 3) / 4) - padding)
}

export function sniffMimeType(bytes: Uint8Array): string | null {
  for (const signature of SIGNATURES) {
    const offset = signature.offset ?? 0
    if (bytes.length < offset + signature.bytes.length) continue
    if (signature.bytes.every((value, index) => bytes[offset + index] === value)) {
      return signature.mimeType
    }
  }
  return null
}

function malformed(message: string) {
  return new ServiceError("PAYLOAD_INVALID", message, { reason: "malformed_image" })
}

/**
 * Accepts raw base64 or a base64 data URL. The size check runs on the decoded
 * length estimate, before the payload is materialized.
 */
export function decodeImagePayload(raw: string, maxBytes: number): DecodedImage {
  const trimmed = raw.trim()
  const dataUrl = DATA_URL_PATTERN.exec(trimmed)
  const declaredType = dataUrl?.[1]?.toLowerCase() ?? null
  const base64 = (dataUrl?.[2] ?? trimmed).replace(/\s+/g, "")

  if (base64.length === 0) throw malformed("Image data is empty")
  if (base64.length % 4 === 1 || !BASE64_PATTERN.test(base64)) {
    throw malformed("Image data is not valid base64")
  }

  const estimated = estimateDecodedBytes(base64)
  if (estimated > maxBytes) {
    throw new ServiceError("PAYLOAD_INVALID", `Image exceeds the ${maxBytes} byte limit`, {
      reason: "payload_too_large",
      max_bytes: maxBytes,
      image_bytes: estimated,
    })
  }

  const bytes = Buffer.from(base64, "base64")
  if (bytes.length === 0) throw malformed("Image data is empty")

  return {
    mimeType: sniffMimeType(bytes) ?? declaredType ?? "image/jpeg",
    base64,
    byteLength: bytes.length,
  }
}
