import { performance } from "node:perf_hooks"
import { ServiceError, toServiceError } from "../lib/errors"
import { decodeImagePayload } from "../lib/image"
import type {
  AnalysisEnvelope,
  AnalysisStage,
  AnalysisType,
  AuthOutcome,
  GenerationResult,
  HistoryRecord,
  Identity,
  PersonalizationMode,
  PreferenceProfile,
  PromptPart,
} from "../types"
import type { GenerativeModelProvider } from "./gemini"
import type { HistoryStore } from "./history"
import { decideAreaMode, decideCameraMode } from "./personalization"
import { composeAreaPrompt, composeCameraPrompt } from "./prompts"

export const AREA_APOLOGY: Record<PersonalizationMode, string> = {
  basic: "申し訳ございませんが、このエリアの分析を完了できませんでした。時間をおいて再度お試しください。",
  personalized:
    "申し訳ございませんが、このエリアの個人化分析を完了できませんでした。時間をおいて再度お試しください。",
}

export interface Clock {
  monotonicMs(): number
  date(): Date
}

export const systemClock: Clock = {
  monotonicMs: () => performance.now(),
  date: () => new Date(),
}

export interface AnalysisDependencies {
  model: GenerativeModelProvider | null
  history: HistoryStore | null
  maxImageBytes: number
  appVersion: string
  responseLanguage: string
  clock?: Clock
}

export interface CameraAnalysisInput {
  identity: Identity
  image: string
  preferences: PreferenceProfile | null
}

export interface AreaAnalysisInput {
  outcome: AuthOutcome
  address: string
  preferences: PreferenceProfile | null
}

class AnalysisRun {
  private current: AnalysisStage = "started"
  private readonly startedAt: number

  constructor(
    readonly flow: AnalysisType,
    readonly clock: Clock
  ) {
    this.startedAt = clock.monotonicMs()
  }

  get stage() {
    return this.current
  }

  advance(stage: AnalysisStage) {
    this.current = stage
  }

  elapsedSeconds() {
    return Number(((this.clock.monotonicMs() - this.startedAt) / 1000).toFixed(3))
  }

  fail(error: unknown): ServiceError {
    const asServiceError = toServiceError(error)
    if (!(error instanceof ServiceError)) {
      console.error(`[${this.flow}] unexpected failure at ${this.current}`, error)
    }
    return new ServiceError(asServiceError.code, asServiceError.message, {
      ...asServiceError.details,
      stage: this.current,
    })
  }
}

function requireModel(model: GenerativeModelProvider | null): GenerativeModelProvider {
  if (!model) {
    throw new ServiceError("PROVIDER_UNAVAILABLE", "AI analysis service is not configured", {
      provider: "vertex_ai",
    })
  }
  return model
}

async function callModel(
  flow: AnalysisType,
  model: GenerativeModelProvider,
  parts: PromptPart[]
): Promise<GenerationResult> {
  try {
    return await model.generate(parts)
  } catch (error) {
    console.error(`[${flow}] model call failed`, error)
    throw new ServiceError("UPSTREAM_PROVIDER_ERROR", "AI provider request failed")
  }
}

// Area answers stay 200: a failed or cut-short generation is reported in metadata.
function degradation(generation: GenerationResult | null) {
  if (!generation) return { incomplete: true, failure: "upstream_provider_error" }
  if (generation.finish !== "stop") {
    return { incomplete: true, finish_reason: generation.finishReason ?? generation.finish }
  }
  return null
}

export async function runCameraAnalysis(
  deps: AnalysisDependencies,
  input: CameraAnalysisInput
): Promise<AnalysisEnvelope> {
  const clock = deps.clock ?? systemClock
  const run = new AnalysisRun("camera", clock)
  const { identity, preferences } = input

  try {
    const model = requireModel(deps.model)
    const image = decodeImagePayload(input.image, deps.maxImageBytes)

    const mode = decideCameraMode(identity, preferences)
    run.advance("decided")

    const prompt = composeCameraPrompt(mode, preferences, deps.responseLanguage)
    run.advance("composed")

    const generation = await callModel("camera", model, [
      { kind: "image", mimeType: image.mimeType, data: image.base64 },
      { kind: "text", text: prompt },
    ])
    run.advance("called")

    if (generation.finish !== "stop") {
      console.warn(`[camera] generation stopped early: ${generation.finishReason ?? generation.finish}`)
      throw new ServiceError(
        "INCOMPLETE_GENERATION",
        "The image analysis could not be completed. Please try a different image.",
        { finish_reason: generation.finishReason ?? generation.finish }
      )
    }
    run.advance("validated")

    const processingTime = run.elapsedSeconds()
    const timestamp = clock.date().toISOString()
    const record: HistoryRecord = {
      user_id: identity.uid,
      analysis: generation.text,
      preferences,
      timestamp,
      processing_time: processingTime,
      analysis_type: "camera",
      app_version: deps.appVersion,
    }

    let historyId: string | null = null
    if (deps.history) {
      run.advance("persist_attempted")
      try {
        historyId = await deps.history.append(identity.uid, record)
        console.info(`[camera] history saved with id ${historyId}`)
      } catch (error) {
        console.warn(`[camera] failed to save history for user ${identity.uid}`, error)
      }
    }

    const envelope: AnalysisEnvelope = {
      subject: `Flyer image (${image.mimeType}, ${image.byteLength} bytes)`,
      analysis: generation.text,
      processing_time: processingTime,
      is_personalized: mode === "personalized",
      timestamp,
      metadata: {
        user_id: identity.uid,
        mode,
        mime_type: image.mimeType,
        image_bytes: image.byteLength,
        history_saved: historyId !== null,
        ...(historyId ? { history_id: historyId } : {}),
      },
    }
    run.advance("completed")
    console.info(`[camera] analysis completed in ${envelope.processing_time.toFixed(2)}s`)
    return envelope
  } catch (error) {
    throw run.fail(error)
  }
}

export async function runAreaAnalysis(
  deps: AnalysisDependencies,
  input: AreaAnalysisInput
): Promise<AnalysisEnvelope> {
  const clock = deps.clock ?? systemClock
  const run = new AnalysisRun("area", clock)
  const { outcome, address, preferences } = input
  const userId = outcome.kind === "authenticated" ? outcome.identity.uid : null

  try {
    const model = requireModel(deps.model)

    const mode = decideAreaMode(outcome, preferences)
    run.advance("decided")
    if (mode === "personalized") {
      console.info(`[area] personalized analysis for user ${userId}`)
    } else {
      console.info("[area] basic analysis (no auth or preferences)")
    }

    const prompt = composeAreaPrompt(address, mode, preferences, deps.responseLanguage)
    run.advance("composed")

    let generation: GenerationResult | null = null
    try {
      generation = await model.generate([{ kind: "text", text: prompt }])
    } catch (error) {
      console.error("[area] model call failed; answering with apology", error)
    }
    run.advance("called")

    const degraded = degradation(generation)
    if (generation && degraded) {
      console.warn(`[area] generation stopped early: ${generation.finishReason ?? generation.finish}`)
    }
    run.advance("validated")

    const envelope: AnalysisEnvelope = {
      subject: address,
      analysis: generation && !degraded ? generation.text : AREA_APOLOGY[mode],
      processing_time: run.elapsedSeconds(),
      is_personalized: mode === "personalized",
      timestamp: clock.date().toISOString(),
      metadata: {
        address,
        user_id: userId,
        mode,
        ...degraded,
      },
    }
    run.advance("completed")
    console.info(`[area] analysis completed in ${envelope.processing_time.toFixed(2)}s`)
    return envelope
  } catch (error) {
    throw run.fail(error)
  }
}
