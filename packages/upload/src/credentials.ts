/**
 * Credentials
 *
 * Basic-auth credentials for protected content, resolved once per run.
 * The interactive prompt is injected by the caller so the upload core never
 * touches the terminal itself.
 */

import type { Target } from '@dashsync/core';

export interface Credential {
  username: string;
  password: string;
}

export interface CredentialSource {
  resolve(target: Target): Promise<Credential | null>;
}

export type PasswordPrompt = (message: string) => Promise<string>;

export interface PromptCredentialOptions {
  username: string;
  password?: string;
  prompt?: PasswordPrompt;
}

/**
 * Asks for the password at most once and caches the answer for the run.
 * An empty answer is remembered as a refusal and never asked again.
 */
export class PromptCredentialSource implements CredentialSource {
  private readonly username: string;
  private readonly prompt?: PasswordPrompt;
  private password: string | null;
  private declined = false;
  private pending: Promise<string | null> | null = null;

  constructor(options: PromptCredentialOptions) {
    this.username = options.username;
    this.password = options.password ?? null;
    this.prompt = options.prompt;
  }

  async resolve(target: Target): Promise<Credential | null> {
    if (this.password) {
      return { username: this.username, password: this.password };
    }
    if (this.declined || !this.prompt) {
      return null;
    }

    // Concurrent uploads share one prompt
    this.pending ??= this.ask(this.prompt, target).finally(() => {
      this.pending = null;
    });
    const password = await this.pending;

    return password ? { username: this.username, password } : null;
  }

  private async ask(prompt: PasswordPrompt, target: Target): Promise<string | null> {
    const answer = (await prompt(
      `Authentication required for protected content on ${target.url}`
    )).trim();

    if (!answer) {
      this.declined = true;
      return null;
    }

    this.password = answer;
    return answer;
  }
}

export interface AuthPolicy {
  // Substrings of target URLs that sit behind the auth proxy
  proxyHosts: string[];
  // Dataset names whose paths need credentials
  protectedDatasets: string[];
}

/**
 * Decides which requests carry credentials.
 */
export class AuthGate {
  private readonly policy: AuthPolicy;
  private readonly source: CredentialSource | null;

  constructor(policy: AuthPolicy, source: CredentialSource | null = null) {
    this.policy = policy;
    this.source = source;
  }

  isProxied(target: Target): boolean {
    return this.policy.proxyHosts.some(host => target.url.includes(host));
  }

  isProtectedPath(relativePath: string): boolean {
    return this.policy.protectedDatasets.some(dataset => relativePath.includes(dataset));
  }

  /**
   * Credentials for a file request, or null when the request goes out bare.
   */
  async forPath(target: Target, relativePath: string): Promise<Credential | null> {
    if (!this.isProxied(target) || !this.isProtectedPath(relativePath)) {
      return null;
    }
    return this.source ? this.source.resolve(target) : null;
  }

  /**
   * Credentials for a target-wide request (the listing), after a 401.
   */
  async forTarget(target: Target): Promise<Credential | null> {
    if (!this.isProxied(target)) {
      return null;
    }
    return this.source ? this.source.resolve(target) : null;
  }
}
