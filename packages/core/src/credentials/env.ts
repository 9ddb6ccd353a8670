import { ConfigurationError } from "../errors/catalog.js";
import type { CredentialSource, Credentials } from "./types.js";

export const ACCESS_KEY_ID_VAR = "AWS_ACCESS_KEY_ID";
export const SECRET_ACCESS_KEY_VAR = "AWS_SECRET_ACCESS_KEY";
export const SESSION_TOKEN_VAR = "AWS_SESSION_TOKEN";

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (value === undefined || value === "") {
    throw new ConfigurationError(`Missing ${name} environment variable`, {
      variable: name,
    });
  }
  return value;
}

/**
 * Reads credentials from the environment on every call, so rotating the
 * variables takes effect without rebuilding the backend.
 */
export function createEnvCredentialSource(
  env: NodeJS.ProcessEnv = process.env,
): CredentialSource {
  return {
    resolve(): Credentials {
      const accessKeyId = required(env, ACCESS_KEY_ID_VAR);
      const secretAccessKey = required(env, SECRET_ACCESS_KEY_VAR);
      const sessionToken = env[SESSION_TOKEN_VAR];
      return {
        accessKeyId,
        secretAccessKey,
        ...(sessionToken ? { sessionToken } : {}),
      };
    },
  };
}

export function createStaticCredentialSource(
  credentials: Credentials,
): CredentialSource {
  return {
    resolve(): Credentials {
      if (!credentials.accessKeyId) {
        throw new ConfigurationError("Missing access key id");
      }
      if (!credentials.secretAccessKey) {
        throw new ConfigurationError("Missing secret access key");
      }
      return { ...credentials };
    },
  };
}
