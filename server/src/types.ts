export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export interface Identity {
  uid: string
  email: string | null
  name: string | null
}

export type AuthErrorKind = "missing_credential" | "invalid_token" | "service_unavailable"

export interface AuthError {
  kind: AuthErrorKind
  message: string
}

export type AuthOutcome = { kind: "unauthenticated" } | { kind: "authenticated"; identity: Identity }

export interface PreferenceProfile {
  transportation_priority: number
  facilities_priority: number
  lifestyle_priority: number
  budget_priority: number
  specific_facilities: string[]
  transportation_types: string[]
}

export type PersonalizationMode = "basic" | "personalized"

export type AnalysisType = "camera" | "area"

export type AnalysisStage =
  | "started"
  | "decided"
  | "composed"
  | "called"
  | "validated"
  | "persist_attempted"
  | "completed"

export interface AnalysisEnvelope {
  subject: string
  analysis: string
  processing_time: number
  is_personalized: boolean
  timestamp: string
  metadata: Record<string, unknown>
}

export type PromptPart = { kind: "text"; text: string } | { kind: "image"; mimeType: string; data: string }

export type FinishSignal = "stop" | "max_tokens" | "safety" | "other" | "none"

export interface GenerationResult {
  text: string
  finish: FinishSignal
  finishReason: string | null
  candidateCount: number
}

export interface HistoryRecord {
  user_id: string
  analysis: string
  preferences: PreferenceProfile | null
  timestamp: string
  processing_time: number
  analysis_type: AnalysisType
  app_version: string
}

export interface HistoryEntry extends HistoryRecord {
  id: string
}

export interface AddressPrediction {
  description: string
  place_id: string
  main_text: string
  secondary_text: string
  types: string[]
}

export interface GeocodedAddress {
  formatted_address: string
  place_id: string
  types: string[]
}

export interface AddressSuggestionsResponse {
  predictions: AddressPrediction[]
  status: "success"
}

export interface GeocodingResponse {
  formatted_address: string
  latitude: number
  longitude: number
  confidence: number
}

export interface HistoryListResponse {
  history: HistoryEntry[]
  count: number
  user_id: string
}

export interface HistoryDeleteResponse {
  message: string
  deleted_id: string
}

export interface ProviderAvailability {
  vertex_ai_available: boolean
  firebase_available: boolean
  google_maps_available: boolean
  history_available: boolean
}

export interface ServiceStatusResponse extends ProviderAvailability {
  message: string
  status: "running"
  version: string
  timestamp: string
}

export interface HealthResponse extends ProviderAvailability {
  status: "healthy"
  service: string
  timestamp: string
}
