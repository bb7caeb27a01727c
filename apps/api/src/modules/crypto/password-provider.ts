import { ConfigurationError } from "../../core/errors.js";

export const MIN_PASSWORD_LENGTH = 8;
export const DEFAULT_PASSWORD_ENV = "BACKHAUL_PASSWORD";

export interface PasswordProvider {
  /** `null` when no password is available. */
  getPassword(): Promise<string | null>;
  /** Forgets any cached value, e.g. after a failed decryption. */
  clearPassword(): void;
}

export function validatePassword(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new ConfigurationError(`Encryption password must be at least ${MIN_PASSWORD_LENGTH} characters`, ["password"]);
  }
}

export class EnvPasswordProvider implements PasswordProvider {
  private cached: string | null = null;

  constructor(
    private readonly variable = DEFAULT_PASSWORD_ENV,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async getPassword(): Promise<string | null> {
    if (this.cached !== null) {
      return this.cached;
    }
    const value = this.env[this.variable];
    if (!value) {
      return null;
    }
    validatePassword(value);
    this.cached = value;
    return value;
  }

  /** The variable is read again on the next request. */
  clearPassword(): void {
    this.cached = null;
  }
}

export class StaticPasswordProvider implements PasswordProvider {
  constructor(private readonly password: string | null) {}

  async getPassword(): Promise<string | null> {
    return this.password;
  }

  /** Nothing is cached. */
  clearPassword(): void {
    return;
  }
}

/** Fetches a password or fails with a ConfigurationError naming `purpose`. */
export async function requirePassword(provider: PasswordProvider, purpose: string): Promise<string> {
  const password = await provider.getPassword();
  if (!password) {
    throw new ConfigurationError(`A password is required for ${purpose} but none was provided`, ["password"]);
  }
  return password;
}
