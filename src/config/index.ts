import { env, type Env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv, loadModeEnvFile } from "./env.js";

export type Config = Readonly<Env>;
export const config: Config = Object.freeze({ ...env });
