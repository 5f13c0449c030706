/** 驗證過的憑證組合 */
export interface Credentials {
  accessToken: string;
  llmApiKey?: string;
  vaultRootPath: string;
}

export interface CredentialPort {
  /** @throws CredentialsNotFoundError */
  resolve(): Promise<Credentials>;
}
