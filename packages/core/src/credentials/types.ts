export interface Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  /** Present for temporary (STS) credentials; sent as x-amz-security-token. */
  sessionToken?: string;
}

/**
 * Supplies the credentials a request is signed with.
 * `resolve()` throws ConfigurationError when a required value is missing.
 */
export interface CredentialSource {
  resolve(): Credentials;
}
