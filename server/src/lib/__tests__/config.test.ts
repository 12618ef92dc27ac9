import { describe, expect, it } from "vitest"
import { ConfigError, jsonBodyLimitBytes, loadConfig } from "../config"

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({})

    expect(config).toEqual({
      port: 8080,
      corsOrigins: null,
      vertex: {
        project: null,
        location: "us-central1",
        model: "gemini-2.0-flash",
        maxOutputTokens: 2048,
        temperature: 0.7,
        topP: 0.8,
      },
      maps: { apiKey: null, language: "ja" },
      firebaseServiceAccountKey: null,
      responseLanguage: "Japanese",
      maxImageBytes: 50 * 1024 * 1024,
      history: { defaultLimit: 20, maxLimit: 100 },
      cacheDir: "cache",
      appVersion: "v1.0",
    })
  })

  it("reads overrides and splits CORS origins", () => {
    const config = loadConfig({
      PORT: "3001",
      FRONTEND_ORIGIN: "http://localhost:3000, https://app.example.com",
      GOOGLE_CLOUD_PROJECT: "test-project",
      GOOGLE_MAPS_API_KEY: "test-key",
      GEMINI_TEMPERATURE: "0.2",
      HISTORY_DEFAULT_LIMIT: "5",
      RESPONSE_LANGUAGE: "English",
    })

    expect(config.port).toBe(3001)
    expect(config.corsOrigins).toEqual(["http://localhost:3000", "https://app.example.com"])
    expect(config.vertex.project).toBe("test-project")
    expect(config.vertex.temperature).toBe(0.2)
    expect(config.maps.apiKey).toBe("test-key")
    expect(config.history.defaultLimit).toBe(5)
    expect(config.responseLanguage).toBe("English")
  })

  it("treats blank optional values as unset", () => {
    expect(loadConfig({ GOOGLE_MAPS_API_KEY: "   " }).maps.apiKey).toBeNull()
  })

  it("returns a frozen snapshot", () => {
    const config = loadConfig({})

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.vertex)).toBe(true)
  })

  it("rejects invalid values with a ConfigError", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigError)
    expect(() => loadConfig({ GEMINI_TOP_P: "1.5" })).toThrow(/GEMINI_TOP_P/)
  })

  it("rejects a default history limit above the maximum", () => {
    expect(() => loadConfig({ HISTORY_DEFAULT_LIMIT: "50", HISTORY_MAX_LIMIT: "10" })).toThrow(
      "Invalid configuration: HISTORY_DEFAULT_LIMIT: must not exceed HISTORY_MAX_LIMIT"
    )
  })
})

describe("jsonBodyLimitBytes", () => {
  it("leaves room for base64 inflation", () => {
    expect(jsonBodyLimitBytes({ maxImageBytes: 3 * 1024 * 1024 })).toBe(5 * 1024 * 1024)
  })
})
