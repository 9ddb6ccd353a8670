export type { Credentials, CredentialSource } from "./types.js";
export {
  ACCESS_KEY_ID_VAR,
  SECRET_ACCESS_KEY_VAR,
  SESSION_TOKEN_VAR,
  createEnvCredentialSource,
  createStaticCredentialSource,
} from "./env.js";
