import type { ErrorBody } from "../../server/src/lib/errors"
import type {
  AddressSuggestionsResponse,
  AnalysisEnvelope,
  GeocodingResponse,
  HealthResponse,
  HistoryDeleteResponse,
  HistoryListResponse,
  PreferenceProfile,
  ServiceStatusResponse,
} from "../../server/src/types"

const DEFAULT_API_BASE_URL = process.env.API_BASE_URL ?? "http://localhost:8080"

export interface ApiClientOptions {
  baseUrl?: string
  getIdToken?: () => Promise<string | null> | string | null
  fetchImpl?: typeof fetch
}

export class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message)
    this.name = "ApiRequestError"
  }
}

async function parseJsonBody<T>(response: Response, context: string): Promise<T> {
  const raw = await response.text()
  const trimmed = raw.trim()
  if (!trimmed) {
    throw new Error(`Empty response from ${context}`)
  }

  try {
    return JSON.parse(trimmed) as T
  } catch {
    throw new Error(`Unexpected response format from ${context}. Check API server configuration.`)
  }
}

function parseErrorBody(text: string): Partial<ErrorBody> | null {
  try {
    return JSON.parse(text) as Partial<ErrorBody>
  } catch {
    return null
  }
}

async function toRequestError(response: Response): Promise<ApiRequestError> {
  const fallback = `Request failed (${response.status})`
  const raw = await response.text()
  const json = raw.trim() ? parseErrorBody(raw.trim()) : null
  const message = json?.error?.message
  return new ApiRequestError(
    response.status,
    json?.error?.code ?? "UNKNOWN",
    typeof message === "string" && message.trim().length > 0 ? message : fallback
  )
}

export function createApiClient(options: ApiClientOptions = {}) {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "")
  const fetchImpl = options.fetchImpl ?? fetch

  async function request<T>(path: string, init?: Omit<RequestInit, "headers"> & { auth?: boolean }): Promise<T> {
    const { auth, ...requestInit } = init ?? {}
    const headers: Record<string, string> = { "Content-Type": "application/json" }
    if (auth !== false && options.getIdToken) {
      const token = await options.getIdToken()
      if (token) headers.Authorization = `Bearer ${token}`
    }

    const response = await fetchImpl(`${baseUrl}${path}`, { ...requestInit, headers })
    if (!response.ok) {
      throw await toRequestError(response)
    }
    return parseJsonBody<T>(response, path)
  }

  return {
    status(): Promise<ServiceStatusResponse> {
      return request<ServiceStatusResponse>("/", { auth: false })
    },

    health(): Promise<HealthResponse> {
      return request<HealthResponse>("/health", { auth: false })
    },

    analyzeCamera(image: string, preferences?: PreferenceProfile | null): Promise<AnalysisEnvelope> {
      return request<AnalysisEnvelope>("/api/camera-analysis", {
        method: "POST",
        body: JSON.stringify({ image, preferences: preferences ?? null }),
      })
    },

    analyzeArea(address: string, preferences?: PreferenceProfile | null): Promise<AnalysisEnvelope> {
      return request<AnalysisEnvelope>("/api/area-analysis", {
        method: "POST",
        body: JSON.stringify({ address, preferences: preferences ?? null }),
      })
    },

    addressSuggestions(input: string, types = "address", country = "jp"): Promise<AddressSuggestionsResponse> {
      return request<AddressSuggestionsResponse>("/api/address-suggestions", {
        method: "POST",
        body: JSON.stringify({ input, types, country }),
        auth: false,
      })
    },

    geocode(latitude: number, longitude: number): Promise<GeocodingResponse> {
      return request<GeocodingResponse>("/api/geocoding", {
        method: "POST",
        body: JSON.stringify({ latitude, longitude }),
        auth: false,
      })
    },

    getHistory(limit?: number): Promise<HistoryListResponse> {
      const query = limit !== undefined ? `?limit=${limit}` : ""
      return request<HistoryListResponse>(`/api/analysis-history${query}`)
    },

    deleteHistory(historyId: string): Promise<HistoryDeleteResponse> {
      return request<HistoryDeleteResponse>(`/api/analysis-history/${encodeURIComponent(historyId)}`, {
        method: "DELETE",
      })
    },
  }
}

export type ApiClient = ReturnType<typeof createApiClient>
