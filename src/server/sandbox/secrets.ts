/**
 * Secrets provider
 *
 * Supplies backend credentials. Consulted once, when the runtime factory is
 * built, never per call.
 */

export interface SecretsProvider {
  getSecret(key: string): string | undefined;
}

/**
 * Reads `KEY`, falling back to `SANDBOX_KEY`
 */
export class EnvSecretsProvider implements SecretsProvider {
  constructor(
    private readonly env: Record<string, string | undefined> = process.env,
    private readonly prefix: string = 'SANDBOX_'
  ) {}

  getSecret(key: string): string | undefined {
    const value = this.env[key] || this.env[`${this.prefix}${key}`];
    return value ? value : undefined;
  }
}

/**
 * Fixed secrets, for tests and embedding
 */
export class StaticSecretsProvider implements SecretsProvider {
  private readonly secrets: Map<string, string>;

  constructor(secrets: Record<string, string>) {
    this.secrets = new Map(Object.entries(secrets));
  }

  getSecret(key: string): string | undefined {
    return this.secrets.get(key);
  }
}
