import { cacheKey, type JsonCache } from "../lib/cache"
import { latLngParam } from "../lib/geo"
import type { AddressPrediction, GeocodedAddress } from "../types"

const PLACES_AUTOCOMPLETE_URL = "https://maps.googleapis.com/maps/api/place/autocomplete/json"
const GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json"
const REQUEST_TIMEOUT_MS = 15_000
const SUCCESS_STATUSES = new Set(["OK", "ZERO_RESULTS"])

export interface AutocompleteQuery {
  input: string
  types: string
  country: string
}

export interface PlacesProvider {
  autocomplete(query: AutocompleteQuery): Promise<AddressPrediction[]>
  reverseGeocode(latitude: number, longitude: number): Promise<GeocodedAddress | null>
}

export interface GoogleMapsOptions {
  apiKey: string
  language: string
  cache?: JsonCache
  fetchImpl?: typeof fetch
}

interface AutocompleteResponse {
  status: string
  error_message?: string
  predictions?: Array<{
    description?: string
    place_id?: string
    types?: string[]
    structured_formatting?: {
      main_text?: string
      secondary_text?: string
    }
  }>
}

interface GeocodeResponse {
  status: string
  error_message?: string
  results?: Array<{
    formatted_address?: string
    place_id?: string
    types?: string[]
  }>
}

export class MapsApiError extends Error {
  constructor(
    readonly status: string,
    message: string
  ) {
    super(message)
    this.name = "MapsApiError"
  }
}

export function createGoogleMapsProvider(options: GoogleMapsOptions): PlacesProvider {
  const fetchImpl = options.fetchImpl ?? fetch

  async function getJson<T extends { status: string; error_message?: string }>(url: URL): Promise<T> {
    url.searchParams.set("key", options.apiKey)
    const response = await fetchImpl(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    })

    if (!response.ok) {
      const text = await response.text()
      throw new MapsApiError(`HTTP_${response.status}`, `Maps error ${response.status}: ${text.slice(0, 200)}`)
    }

    const json = (await response.json()) as T
    if (!SUCCESS_STATUSES.has(json.status)) {
      throw new MapsApiError(json.status, `Maps status ${json.status}: ${json.error_message ?? "no message"}`)
    }
    return json
  }

  return {
    async autocomplete(query) {
      const normalized = query.input.trim().toLowerCase()
      const key = cacheKey(
        `autocomplete:v1:${options.language}:${query.types}:${query.country}:${normalized}`
      )
      const cached = await options.cache?.read<AddressPrediction[]>("autocomplete", key)
      if (cached) return cached

      const url = new URL(PLACES_AUTOCOMPLETE_URL)
      url.searchParams.set("input", query.input)
      url.searchParams.set("types", query.types)
      url.searchParams.set("components", `country:${query.country}`)
      url.searchParams.set("language", options.language)

      const raw = await getJson<AutocompleteResponse>(url)
      const predictions: AddressPrediction[] = (raw.predictions ?? [])
        .map((item) => {
          if (!item.description || !item.place_id) return null
          return {
            description: item.description,
            place_id: item.place_id,
            main_text: item.structured_formatting?.main_text ?? item.description,
            secondary_text: item.structured_formatting?.secondary_text ?? "",
            types: item.types ?? [],
          }
        })
        .filter((item): item is AddressPrediction => item !== null)

      await options.cache?.write("autocomplete", key, predictions)
      return predictions
    },

    async reverseGeocode(latitude, longitude) {
      const latlng = latLngParam(latitude, longitude)
      const key = cacheKey(`reverse-geocode:v1:${options.language}:${latlng}`)
      const cached = await options.cache?.read<GeocodedAddress>("geocode", key)
      if (cached) return cached

      const url = new URL(GEOCODE_URL)
      url.searchParams.set("latlng", latlng)
      url.searchParams.set("language", options.language)

      const raw = await getJson<GeocodeResponse>(url)
      const first = (raw.results ?? []).find((item) => item.formatted_address && item.place_id)
      if (!first?.formatted_address || !first.place_id) return null

      const address: GeocodedAddress = {
        formatted_address: first.formatted_address,
        place_id: first.place_id,
        types: first.types ?? [],
      }
      await options.cache?.write("geocode", key, address)
      return address
    },
  }
}
