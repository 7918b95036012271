// src/lib/error-messages.ts
export const ERR_MSG = {
  BAD_INPUT_SCHEMA: "Request validation failed",
  BAD_PATH_PARAMS: "Invalid path parameters",
  PARAMS_TOO_LARGE: "Job params exceed the maximum size of {limit} bytes",
  JOB_NOT_FOUND: "Job not found",
  ARTIFACT_NOT_READY: "Job has no artifact in state {state}",
  ARTIFACT_MISSING: "Artifact is no longer available",
  RATE_LIMIT_RPM: "Too many requests, please try again shortly",
  INVALID_API_KEY: "Valid x-api-key header required",
  QUEUE_UNAVAILABLE: "Temporary problem, please try again shortly",
  INTERNAL_UNEXPECTED: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Optional tiny templating for limits/caps
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}` , "g"), String(v));
  return s;
}
