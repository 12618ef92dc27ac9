import type { AuthOutcome, Identity, PersonalizationMode, PreferenceProfile } from "../types"

// Area analysis needs both a signed-in caller and a profile.
export function decideAreaMode(
  outcome: AuthOutcome,
  preferences: PreferenceProfile | null | undefined
): PersonalizationMode {
  return outcome.kind === "authenticated" && preferences ? "personalized" : "basic"
}

// Camera analysis is only reachable with an identity, so the profile alone decides.
export function decideCameraMode(
  _identity: Identity,
  preferences: PreferenceProfile | null | undefined
): PersonalizationMode {
  return preferences ? "personalized" : "basic"
}
