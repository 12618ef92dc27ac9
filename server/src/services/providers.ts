import { cert, getApps, initializeApp, type App } from "firebase-admin/app"
import { getAuth } from "firebase-admin/auth"
import { getFirestore } from "firebase-admin/firestore"
import { createJsonCache } from "../lib/cache"
import type { AppConfig } from "../lib/config"
import { providerAvailability, type Providers } from "../app"
import { createFirebaseTokenVerifier } from "./auth"
import { createGeminiProvider, createVertexModel, type GenerativeModelProvider } from "./gemini"
import { createFirestoreHistoryStore } from "./history"
import { createGoogleMapsProvider, type PlacesProvider } from "./maps"

function initFirebase(serviceAccountKey: string | null): App | null {
  if (!serviceAccountKey) {
    console.warn("[providers] FIREBASE_SERVICE_ACCOUNT_KEY not set; auth and history disabled")
    return null
  }
  try {
    const existing = getApps()[0]
    if (existing) return existing
    return initializeApp({ credential: cert(JSON.parse(serviceAccountKey)) })
  } catch (error) {
    console.error("[providers] Firebase initialization failed", error)
    return null
  }
}

function initModel(vertex: AppConfig["vertex"]): GenerativeModelProvider | null {
  const project = vertex.project
  if (!project) {
    console.warn("[providers] GOOGLE_CLOUD_PROJECT not set; AI analysis disabled")
    return null
  }
  try {
    const model = createVertexModel({ ...vertex, project })
    console.info(`[providers] Vertex AI ready (${project}/${vertex.location}, ${vertex.model})`)
    return createGeminiProvider(model)
  } catch (error) {
    console.error("[providers] Vertex AI initialization failed", error)
    return null
  }
}

function initMaps(config: Readonly<AppConfig>): PlacesProvider | null {
  if (!config.maps.apiKey) {
    console.warn("[providers] GOOGLE_MAPS_API_KEY not set; address lookup disabled")
    return null
  }
  return createGoogleMapsProvider({
    apiKey: config.maps.apiKey,
    language: config.maps.language,
    cache: createJsonCache(config.cacheDir),
  })
}

/** Resolves every provider once at startup. A failing provider is reported as unavailable. */
export function initProviders(config: Readonly<AppConfig>): Providers {
  const firebase = initFirebase(config.firebaseServiceAccountKey)
  const providers: Providers = {
    verifier: createFirebaseTokenVerifier(firebase ? getAuth(firebase) : null),
    history: firebase ? createFirestoreHistoryStore(getFirestore(firebase)) : null,
    model: initModel(config.vertex),
    maps: initMaps(config),
  }

  const availability = providerAvailability(providers)
  console.info("[providers] availability", availability)
  return providers
}
