import { z } from "zod"

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim()
    return trimmed && trimmed.length > 0 ? trimmed : null
  })

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  FRONTEND_ORIGIN: optionalString,
  GOOGLE_CLOUD_PROJECT: optionalString,
  VERTEX_AI_LOCATION: z.string().trim().min(1).default("us-central1"),
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.0-flash"),
  GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  GEMINI_TOP_P: z.coerce.number().min(0).max(1).default(0.8),
  GOOGLE_MAPS_API_KEY: optionalString,
  MAPS_LANGUAGE: z.string().trim().min(1).default("ja"),
  RESPONSE_LANGUAGE: z.string().trim().min(1).default("Japanese"),
  FIREBASE_SERVICE_ACCOUNT_KEY: optionalString,
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  HISTORY_DEFAULT_LIMIT: z.coerce.number().int().positive().default(20),
  HISTORY_MAX_LIMIT: z.coerce.number().int().positive().default(100),
  CACHE_DIR: z.string().trim().min(1).default("cache"),
  APP_VERSION: z.string().trim().min(1).default("v1.0"),
})

export interface AppConfig {
  port: number
  corsOrigins: string[] | null
  vertex: {
    project: string | null
    location: string
    model: string
    maxOutputTokens: number
    temperature: number
    topP: number
  }
  maps: {
    apiKey: string | null
    language: string
  }
  firebaseServiceAccountKey: string | null
  responseLanguage: string
  maxImageBytes: number
  history: {
    defaultLimit: number
    maxLimit: number
  }
  cacheDir: string
  appVersion: string
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === "object" && !Object.isFrozen(nested)) {
      deepFreeze(nested)
    }
  }
  return Object.freeze(value)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    )
  }

  const values = parsed.data
  if (values.HISTORY_DEFAULT_LIMIT > values.HISTORY_MAX_LIMIT) {
    throw new ConfigError(["HISTORY_DEFAULT_LIMIT: must not exceed HISTORY_MAX_LIMIT"])
  }

  return deepFreeze({
    port: values.PORT,
    corsOrigins: values.FRONTEND_ORIGIN
      ? values.FRONTEND_ORIGIN.split(",")
          .map((item) => item.trim())
          .filter(Boolean)
      : null,
    vertex: {
      project: values.GOOGLE_CLOUD_PROJECT,
      location: values.VERTEX_AI_LOCATION,
      model: values.GEMINI_MODEL,
      maxOutputTokens: values.GEMINI_MAX_OUTPUT_TOKENS,
      temperature: values.GEMINI_TEMPERATURE,
      topP: values.GEMINI_TOP_P,
    },
    maps: {
      apiKey: values.GOOGLE_MAPS_API_KEY,
      language: values.MAPS_LANGUAGE,
    },
    firebaseServiceAccountKey: values.FIREBASE_SERVICE_ACCOUNT_KEY,
    responseLanguage: values.RESPONSE_LANGUAGE,
    maxImageBytes: values.MAX_IMAGE_BYTES,
    history: {
      defaultLimit: values.HISTORY_DEFAULT_LIMIT,
      maxLimit: values.HISTORY_MAX_LIMIT,
    },
    cacheDir: values.CACHE_DIR,
    appVersion: values.APP_VERSION,
  })
}

// Base64 inflates by 4/3; leave headroom for the rest of the JSON body.
export function jsonBodyLimitBytes(config: Pick<AppConfig, "maxImageBytes">) {
  return Math.ceil((config.maxImageBytes * 4) / 3) + 1024 * 1024
}
