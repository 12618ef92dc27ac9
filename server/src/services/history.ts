import type { DocumentData, Firestore, QueryDocumentSnapshot } from "firebase-admin/firestore"
import type { HistoryEntry, HistoryRecord, PreferenceProfile } from "../types"

export interface HistoryStore {
  append(uid: string, record: HistoryRecord): Promise<string>
  list(uid: string, limit: number): Promise<HistoryEntry[]>
  remove(uid: string, id: string): Promise<boolean>
}

const USERS_COLLECTION = "users"
const HISTORY_COLLECTION = "analysisHistory"

function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback
}

function asNumber(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0
}

function asStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : []
}

function asPreferences(value: unknown): PreferenceProfile | null {
  if (!value || typeof value !== "object") return null
  const raw: Record<string, unknown> = { ...value }
  return {
    transportation_priority: asNumber(raw.transportation_priority),
    facilities_priority: asNumber(raw.facilities_priority),
    lifestyle_priority: asNumber(raw.lifestyle_priority),
    budget_priority: asNumber(raw.budget_priority),
    specific_facilities: asStringList(raw.specific_facilities),
    transportation_types: asStringList(raw.transportation_types),
  }
}

export function historyEntryFromDocument(id: string, data: DocumentData): HistoryEntry {
  return {
    id,
    user_id: asString(data.user_id),
    analysis: asString(data.analysis),
    preferences: asPreferences(data.preferences),
    timestamp: asString(data.timestamp),
    processing_time: asNumber(data.processing_time),
    analysis_type: data.analysis_type === "area" ? "area" : "camera",
    app_version: asString(data.app_version, "unknown"),
  }
}

export function createFirestoreHistoryStore(db: Firestore): HistoryStore {
  function historyCollection(uid: string) {
    return db.collection(USERS_COLLECTION).doc(uid).collection(HISTORY_COLLECTION)
  }

  return {
    async append(uid, record) {
      const docRef = historyCollection(uid).doc()
      await docRef.set(record)
      return docRef.id
    },

    async list(uid, limit) {
      const snapshot = await historyCollection(uid).orderBy("timestamp", "desc").limit(limit).get()
      return snapshot.docs.map((doc: QueryDocumentSnapshot) => historyEntryFromDocument(doc.id, doc.data()))
    },

    async remove(uid, id) {
      const docRef = historyCollection(uid).doc(id)
      const existing = await docRef.get()
      if (!existing.exists) return false
      await docRef.delete()
      return true
    },
  }
}
