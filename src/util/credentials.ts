import { ConfigurationError } from "../errors.js";

export const API_KEY_ENV = "MISTRAL_API_KEY";

export function resolveApiKey(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const fromCli = explicit?.trim();
  if (fromCli) return fromCli;

  const fromEnv = env[API_KEY_ENV]?.trim();
  if (fromEnv) return fromEnv;

  throw new ConfigurationError(
    `API key is required. Please provide it with --api-key or set the ${API_KEY_ENV} environment variable.`,
  );
}
