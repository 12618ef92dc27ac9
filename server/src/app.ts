import cors from "cors"
import express from "express"
import { z } from "zod"
import { jsonBodyLimitBytes, type AppConfig } from "./lib/config"
import { errorBody, ServiceError, toServiceError } from "./lib/errors"
import { isValidLatitude, isValidLongitude } from "./lib/geo"
import { latencyLogger } from "./middleware/latency"
import { runAreaAnalysis, runCameraAnalysis, type AnalysisDependencies, type Clock } from "./services/analysis"
import {
  authErrorToServiceError,
  optionalAuth,
  parseBearer,
  requireAuth,
  resolveAuthOutcome,
  type TokenVerifier,
} from "./services/auth"
import type { GenerativeModelProvider } from "./services/gemini"
import type { HistoryStore } from "./services/history"
import type { PlacesProvider } from "./services/maps"
import type {
  AddressSuggestionsResponse,
  GeocodingResponse,
  HealthResponse,
  HistoryDeleteResponse,
  HistoryListResponse,
  Identity,
  ProviderAvailability,
  ServiceStatusResponse,
} from "./types"

export const SERVICE_NAME = "Flyer & Area Analysis API"

export interface Providers {
  verifier: TokenVerifier
  model: GenerativeModelProvider | null
  maps: PlacesProvider | null
  history: HistoryStore | null
}

export interface AppDependencies {
  config: Readonly<AppConfig>
  providers: Providers
  clock?: Clock
}

export function providerAvailability(providers: Providers): ProviderAvailability {
  return {
    vertex_ai_available: providers.model !== null,
    firebase_available: providers.verifier.available,
    google_maps_available: providers.maps !== null,
    history_available: providers.history !== null,
  }
}

const weightSchema = z.number().int().min(1).max(5)
const preferenceItemSchema = z.string().trim().min(1).max(100)

const preferencesSchema = z.object({
  transportation_priority: weightSchema,
  facilities_priority: weightSchema,
  lifestyle_priority: weightSchema,
  budget_priority: weightSchema,
  specific_facilities: z.array(preferenceItemSchema).max(20).default([]),
  transportation_types: z.array(preferenceItemSchema).max(20).default([]),
})

const cameraAnalysisSchema = z.object({
  image: z.string().min(1, "image is required"),
  preferences: preferencesSchema.nullish(),
})

const areaAnalysisSchema = z.object({
  address: z.string().trim().min(1, "address is required").max(200),
  preferences: preferencesSchema.nullish(),
})

const addressSuggestionsSchema = z.object({
  input: z.string().trim().min(1, "input is required").max(200),
  types: z.string().trim().min(1).default("address"),
  country: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/, "country must be a two-letter code")
    .transform((value) => value.toLowerCase())
    .default("jp"),
})

const historyParamsSchema = z.object({
  historyId: z
    .string()
    .trim()
    .min(1, "historyId is required")
    .regex(/^[^/]+$/, "historyId must not contain '/'"),
})

const geocodingSchema = z.object({
  latitude: z.number().refine(isValidLatitude, "latitude must be between -90 and 90"),
  longitude: z.number().refine(isValidLongitude, "longitude must be between -180 and 180"),
})

function invalidPayload(error: z.ZodError, fallback: string) {
  const issue = error.issues[0]
  return new ServiceError("PAYLOAD_INVALID", issue?.message ?? fallback, {
    path: issue ? issue.path.join(".") : null,
  })
}

function bodyParserError(error: unknown): ServiceError | null {
  if (!error || typeof error !== "object" || !("type" in error)) return null
  if (error.type === "entity.too.large") {
    return new ServiceError("PAYLOAD_INVALID", "Request body is too large", { reason: "payload_too_large" })
  }
  if (error.type === "entity.parse.failed") {
    return new ServiceError("PAYLOAD_INVALID", "Request body is not valid JSON", { reason: "malformed_json" })
  }
  return null
}

function sendError(res: express.Response, scope: string, error: unknown) {
  const serviceError = toServiceError(error)
  if (serviceError.status >= 500 && !(error instanceof ServiceError)) {
    console.error(`[${scope}] error`, error)
  } else {
    console.warn(`[${scope}] ${serviceError.code}: ${serviceError.message}`)
  }
  return res.status(serviceError.status).json(errorBody(serviceError))
}

export function createApp({ config, providers, clock }: AppDependencies) {
  const app = express()

  const analysisDeps: AnalysisDependencies = {
    model: providers.model,
    history: providers.history,
    maxImageBytes: config.maxImageBytes,
    appVersion: config.appVersion,
    responseLanguage: config.responseLanguage,
    clock,
  }

  const historyQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(config.history.maxLimit).default(config.history.defaultLimit),
  })

  async function authenticate(req: express.Request): Promise<Identity> {
    const result = await requireAuth(providers.verifier, parseBearer(req.header("authorization")))
    if (!result.ok) throw authErrorToServiceError(result.error)
    return result.value
  }

  function requireHistory(): HistoryStore {
    if (!providers.history) {
      throw new ServiceError("PROVIDER_UNAVAILABLE", "History storage is not configured", { provider: "firestore" })
    }
    return providers.history
  }

  function requireMaps(): PlacesProvider {
    if (!providers.maps) {
      throw new ServiceError("PROVIDER_UNAVAILABLE", "Google Maps API is not configured", { provider: "google_maps" })
    }
    return providers.maps
  }

  app.use(
    cors({
      origin: config.corsOrigins ?? true,
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
    })
  )
  app.use(latencyLogger)
  app.use(express.json({ limit: jsonBodyLimitBytes(config) }))

  app.get("/", (_req, res) => {
    const body: ServiceStatusResponse = {
      message: SERVICE_NAME,
      status: "running",
      version: config.appVersion,
      ...providerAvailability(providers),
      timestamp: new Date().toISOString(),
    }
    res.json(body)
  })

  app.get("/health", (_req, res) => {
    const body: HealthResponse = {
      status: "healthy",
      service: SERVICE_NAME,
      ...providerAvailability(providers),
      timestamp: new Date().toISOString(),
    }
    res.json(body)
  })

  app.post("/api/camera-analysis", async (req, res) => {
    try {
      const identity = await authenticate(req)
      const parsed = cameraAnalysisSchema.safeParse(req.body)
      if (!parsed.success) throw invalidPayload(parsed.error, "Invalid camera analysis payload")

      console.info(`[camera] analysis request from user ${identity.uid}`)
      const envelope = await runCameraAnalysis(analysisDeps, {
        identity,
        image: parsed.data.image,
        preferences: parsed.data.preferences ?? null,
      })
      return res.json(envelope)
    } catch (error) {
      return sendError(res, "camera", error)
    }
  })

  app.post("/api/area-analysis", async (req, res) => {
    try {
      const parsed = areaAnalysisSchema.safeParse(req.body)
      if (!parsed.success) throw invalidPayload(parsed.error, "Invalid area analysis payload")

      const identity = await optionalAuth(providers.verifier, req.header("authorization"))
      const envelope = await runAreaAnalysis(analysisDeps, {
        outcome: resolveAuthOutcome(identity),
        address: parsed.data.address,
        preferences: parsed.data.preferences ?? null,
      })
      return res.json(envelope)
    } catch (error) {
      return sendError(res, "area", error)
    }
  })

  app.post("/api/address-suggestions", async (req, res) => {
    try {
      const parsed = addressSuggestionsSchema.safeParse(req.body)
      if (!parsed.success) throw invalidPayload(parsed.error, "Invalid address suggestions payload")

      const maps = requireMaps()
      const predictions = await maps.autocomplete(parsed.data).catch((error: unknown) => {
        console.error("[maps] autocomplete failed", error)
        throw new ServiceError("UPSTREAM_PROVIDER_ERROR", "Failed to fetch address suggestions")
      })
      const body: AddressSuggestionsResponse = { predictions, status: "success" }
      return res.json(body)
    } catch (error) {
      return sendError(res, "maps", error)
    }
  })

  app.post("/api/geocoding", async (req, res) => {
    try {
      const parsed = geocodingSchema.safeParse(req.body)
      if (!parsed.success) throw invalidPayload(parsed.error, "Invalid geocoding payload")

      const maps = requireMaps()
      const { latitude, longitude } = parsed.data
      const address = await maps.reverseGeocode(latitude, longitude).catch((error: unknown) => {
        console.error("[maps] reverse geocoding failed", error)
        throw new ServiceError("UPSTREAM_PROVIDER_ERROR", "Failed to resolve address")
      })
      if (!address) {
        throw new ServiceError("NOT_FOUND", "No address found for these coordinates")
      }

      const body: GeocodingResponse = {
        formatted_address: address.formatted_address,
        latitude,
        longitude,
        confidence: 1,
      }
      return res.json(body)
    } catch (error) {
      return sendError(res, "maps", error)
    }
  })

  app.get("/api/analysis-history", async (req, res) => {
    try {
      const identity = await authenticate(req)
      const history = requireHistory()
      const parsed = historyQuerySchema.safeParse(req.query)
      if (!parsed.success) throw invalidPayload(parsed.error, "Invalid history query")

      const entries = await history.list(identity.uid, parsed.data.limit).catch((error: unknown) => {
        console.error("[history] list failed", error)
        throw new ServiceError("PERSISTENCE_FAILURE", "Failed to load analysis history")
      })
      const body: HistoryListResponse = { history: entries, count: entries.length, user_id: identity.uid }
      return res.json(body)
    } catch (error) {
      return sendError(res, "history", error)
    }
  })

  app.delete("/api/analysis-history/:historyId", async (req, res) => {
    try {
      const identity = await authenticate(req)
      const history = requireHistory()
      const params = historyParamsSchema.safeParse(req.params)
      if (!params.success) throw invalidPayload(params.error, "Invalid history id")
      const { historyId } = params.data

      const removed = await history.remove(identity.uid, historyId).catch((error: unknown) => {
        console.error("[history] delete failed", error)
        throw new ServiceError("PERSISTENCE_FAILURE", "Failed to delete analysis history")
      })
      if (!removed) {
        throw new ServiceError("NOT_FOUND", "History entry not found")
      }

      const body: HistoryDeleteResponse = { message: "History entry deleted", deleted_id: historyId }
      return res.json(body)
    } catch (error) {
      return sendError(res, "history", error)
    }
  })

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const parserError = bodyParserError(error)
    if (parserError) {
      return sendError(res, "server", parserError)
    }
    console.error("[server] unhandled", error)
    return res.status(500).json(errorBody(toServiceError(error, "Internal server error")))
  })

  return app
}
