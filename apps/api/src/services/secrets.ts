/** Looks up a provider credential by the key stored on its model. */
export interface SecretResolver {
  resolve(credentialKey: string): Promise<string | undefined>;
}

/**
 * Default resolver backed by the process environment. The config module has
 * already merged `.env` into it through dotenv.
 */
export function createEnvSecretResolver(env: NodeJS.ProcessEnv = process.env): SecretResolver {
  return {
    async resolve(credentialKey) {
      const value = env[credentialKey];
      return value && value.trim() ? value : undefined;
    }
  };
}

export function createStaticSecretResolver(secrets: Readonly<Record<string, string>>): SecretResolver {
  return {
    async resolve(credentialKey) {
      return Object.prototype.hasOwnProperty.call(secrets, credentialKey) ? secrets[credentialKey] : undefined;
    }
  };
}
