import { FinishReason, type GenerateContentCandidate, type GenerateContentResult } from "@google-cloud/vertexai"
import { describe, expect, it, vi } from "vitest"
import { createGeminiProvider, finishSignalFor } from "../gemini"

function fakeVertexModel(candidates: GenerateContentCandidate[] | undefined) {
  const generateContent = vi.fn(
    async (_request: unknown): Promise<GenerateContentResult> => ({ response: { candidates } })
  )
  return { model: { generateContent }, generateContent }
}

describe("finishSignalFor", () => {
  it("maps vendor finish reasons to finish signals", () => {
    expect(finishSignalFor(FinishReason.STOP)).toBe("stop")
    expect(finishSignalFor(FinishReason.MAX_TOKENS)).toBe("max_tokens")
    expect(finishSignalFor(FinishReason.SAFETY)).toBe("safety")
    expect(finishSignalFor(FinishReason.RECITATION)).toBe("other")
    expect(finishSignalFor(undefined)).toBe("none")
  })
})

describe("createGeminiProvider", () => {
  it("sends text and image parts as a single user turn", async () => {
    const { model, generateContent } = fakeVertexModel([
      {
        index: 0,
        content: { role: "model", parts: [{ text: "Bright " }, { text: "flat." }] },
        finishReason: FinishReason.STOP,
      },
    ])
    const provider = createGeminiProvider(model)

    const result = await provider.generate([
      { kind: "image", mimeType: "image/png", data: "aGVsbG8=" },
      { kind: "text", text: "Describe the flyer." },
    ])

    expect(result).toEqual({ text: "Bright flat.", finish: "stop", finishReason: "STOP", candidateCount: 1 })
    expect(generateContent).toHaveBeenCalledWith({
      contents: [
        {
          role: "user",
          parts: [{ inlineData: { mimeType: "image/png", data: "aGVsbG8=" } }, { text: "Describe the flyer." }],
        },
      ],
    })
  })

  it("reports blocked output with its finish reason", async () => {
    const { model } = fakeVertexModel([
      { index: 0, content: { role: "model", parts: [] }, finishReason: FinishReason.SAFETY },
    ])

    const result = await createGeminiProvider(model).generate([{ kind: "text", text: "Analyze." }])

    expect(result).toEqual({ text: "", finish: "safety", finishReason: "SAFETY", candidateCount: 1 })
  })

  it("reports an empty candidate list as no finish", async () => {
    const { model } = fakeVertexModel(undefined)

    const result = await createGeminiProvider(model).generate([{ kind: "text", text: "Analyze." }])

    expect(result).toEqual({ text: "", finish: "none", finishReason: null, candidateCount: 0 })
  })
})
