const TRUTHY = new Set(["1", "true", "yes", "on"]);

export const isTruthyFlag = (value: string | undefined): boolean =>
  TRUTHY.has(value?.trim().toLowerCase() ?? "");

export const readTraceModeEnv = (): string | undefined => process.env.BACKEND_REQUEST_TRACE_MODE?.trim().toLowerCase();
