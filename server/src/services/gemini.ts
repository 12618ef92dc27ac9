import {
  FinishReason,
  HarmBlockThreshold,
  HarmCategory,
  type GenerativeModel,
  type Part,
  VertexAI,
} from "@google-cloud/vertexai"
import type { AppConfig } from "../lib/config"
import type { FinishSignal, GenerationResult, PromptPart } from "../types"

export interface GenerativeModelProvider {
  generate(parts: PromptPart[]): Promise<GenerationResult>
}

export const SAFETY_SETTINGS = [
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_HARASSMENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE }))

export function finishSignalFor(reason: FinishReason | undefined): FinishSignal {
  switch (reason) {
    case undefined:
      return "none"
    case FinishReason.STOP:
      return "stop"
    case FinishReason.MAX_TOKENS:
      return "max_tokens"
    case FinishReason.SAFETY:
      return "safety"
    default:
      return "other"
  }
}

function toVertexPart(part: PromptPart): Part {
  if (part.kind === "image") {
    return { inlineData: { mimeType: part.mimeType, data: part.data } }
  }
  return { text: part.text }
}

function partText(part: Part): string {
  return "text" in part && typeof part.text === "string" ? part.text : ""
}

export function createGeminiProvider(model: Pick<GenerativeModel, "generateContent">): GenerativeModelProvider {
  return {
    async generate(parts) {
      const result = await model.generateContent({
        contents: [{ role: "user", parts: parts.map(toVertexPart) }],
      })
      const candidates = result.response.candidates ?? []
      const first = candidates[0]
      const text = (first?.content?.parts ?? []).map(partText).join("")

      return {
        text,
        finish: first ? finishSignalFor(first.finishReason) : "none",
        finishReason: first?.finishReason ?? null,
        candidateCount: candidates.length,
      }
    },
  }
}

export function createVertexModel(vertex: AppConfig["vertex"] & { project: string }): GenerativeModel {
  const client = new VertexAI({ project: vertex.project, location: vertex.location })
  return client.getGenerativeModel({
    model: vertex.model,
    generationConfig: {
      maxOutputTokens: vertex.maxOutputTokens,
      temperature: vertex.temperature,
      topP: vertex.topP,
    },
    safetySettings: SAFETY_SETTINGS,
  })
}
