import { loadModeEnvFile, parseEnv, type Env } from "./env.js";

export type { Env } from "./env.js";

export type Config = Readonly<Env>;

// .env.<mode> fills only keys the process environment leaves unset.
loadModeEnvFile();

export const config: Config = Object.freeze(parseEnv(process.env));
