import { err, ok, type Result } from "neverthrow";

import type { GridProfile, ProfileError } from "./types";

export function resolveProfile(
  profiles: Readonly<Record<string, GridProfile>>,
  name: string,
): Result<GridProfile, ProfileError> {
  const profile = Object.hasOwn(profiles, name) ? profiles[name] : undefined;
  if (!profile) {
    return err({
      type: "UNKNOWN_PROFILE",
      profile: name,
      message: `Unknown profile "${name}". Available: ${Object.keys(profiles).join(", ")}`,
    });
  }
  return ok(profile);
}
